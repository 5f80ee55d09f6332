import { z } from 'zod';

/**
 * Accept any relay certificate. Local development only.
 */
export const AllTrustConfigSchema = z.object({
  mode: z.literal('trust-all'),
});

/**
 * Fixed key/trust material loaded from PEM or PKCS#12 files.
 * Omitting `caFiles` keeps the system certificate store; at least one
 * kind of material is required, otherwise use `trust-all`.
 */
export const FixedTrustConfigSchema = z.object({
  mode: z.literal('fixed'),
  caFiles: z.array(z.string().min(1)).optional(),
  certFile: z.string().min(1).optional(),
  keyFile: z.string().min(1).optional(),
  pfxFile: z.string().min(1).optional(),
  passphrase: z.string().optional(),
});

export const TrustConfigSchema = z
  .discriminatedUnion('mode', [AllTrustConfigSchema, FixedTrustConfigSchema])
  .superRefine((trust, ctx) => {
    if (trust.mode !== 'fixed') {
      return;
    }
    if (!trust.caFiles && !trust.certFile && !trust.keyFile && !trust.pfxFile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "'fixed' trust needs 'caFiles', 'certFile'/'keyFile' or 'pfxFile'",
        path: [],
      });
      return;
    }
    if (Boolean(trust.certFile) !== Boolean(trust.keyFile)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "'certFile' and 'keyFile' must be configured together",
        path: trust.certFile ? ['keyFile'] : ['certFile'],
      });
    }
    if (trust.pfxFile && trust.certFile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "'pfxFile' cannot be combined with 'certFile'/'keyFile'",
        path: ['pfxFile'],
      });
    }
  });

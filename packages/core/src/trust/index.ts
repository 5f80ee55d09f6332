export { AllTrustProvider, FixedTrustProvider, type TrustProvider } from './trust-provider.js';
export {
  createTrustProvider,
  type CreateTrustProviderOptions,
  type ReadFile,
} from './create-trust-provider.js';

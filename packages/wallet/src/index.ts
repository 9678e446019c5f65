export * from './errors.js';
export * from './wallet-types.js';
export * from './derivation/derivation-paths.js';
export * from './address/address-codec.js';
export * from './layout/wallet-layout.js';
export * from './fs/secure-fs.js';
export * from './key-files/key-envelopes.js';
export type { AddressRequest, KeyMaterial, KeyProvider, ProviderKind, RootKey } from './providers/key-provider.js';
export { SimplifiedKeyProvider, simplifiedPrefixes, type SimplifiedKeyProviderOptions } from './providers/simplified-provider.js';
export {
  CardanoAddressKeyProvider,
  type CardanoAddressKeyProviderOptions,
} from './providers/cardano-address-provider.js';
export {
  canFallBack,
  selectKeyProvider,
  type ProviderSelection,
  type ProviderSelectionOptions,
} from './providers/provider-selection.js';
export * from './tools/tool-runner.js';
export * from './tools/tool-probe.js';
export * from './materializer/wallet-materializer.js';

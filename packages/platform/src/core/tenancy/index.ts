export { checkCapability, type CapabilityDecision } from "./capabilities.js";
export { TenantContextResolver } from "./resolver.js";
export { MemoryIdentityProvider } from "./memory-identity.js";

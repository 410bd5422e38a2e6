export { SettingsResolver } from "./settings-resolver.js";
export type { SettingsResolverOptions, InvalidationListener } from "./settings-resolver.js";

export {
  MemoryInvalidationBus,
  RedisInvalidationBus,
  SETTINGS_INVALIDATION_CHANNEL,
} from "./invalidation-bus.js";
export type {
  InvalidationBus,
  InvalidationHandler,
  RedisInvalidationBusOptions,
  RedisPublisher,
  RedisSubscriber,
} from "./invalidation-bus.js";

export { CredentialManager } from "./credential-manager.js";
export type {
  CredentialManagerOptions,
  AuthorizationStart,
  AuthorizationResult,
  RefreshSweepResult,
} from "./credential-manager.js";

export { HttpOAuthClient } from "./oauth-client.js";
export type { IOAuthClient, AuthorizationRequest, HttpOAuthClientOptions } from "./oauth-client.js";

export { OAUTH_PROVIDERS } from "./oauth-providers.js";
export type { OAuthProviderConfig } from "./oauth-providers.js";

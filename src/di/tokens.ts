/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by layer, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Add @singleton() to the class
 * 3. Register the token alias in container.ts
 * 4. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  Config: {
    /** Validated application config */
    App: Symbol('Config.App'),
  },

  Runtime: {
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  Infra: {
    /** Raw-bytes SHA-256 (Base58Check checksums) */
    Sha256: Symbol('Infra.Sha256'),
    /** Address generation (bytes -> string) */
    AddressEncoder: Symbol('Infra.AddressEncoder'),
  },

  Services: {
    /** Classification + network policy + batch summaries */
    AddressValidation: Symbol('Services.AddressValidation'),
  },
} as const;

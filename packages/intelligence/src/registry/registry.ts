/**
 * Provider registry - decides which declared providers take part in a run.
 *
 * Resolution is pure: it reads the credentials and nothing else. Providers
 * are constructed lazily through the returned thunk, so a construction
 * failure surfaces inside the provider's own task.
 */

import type { CredentialName, Credentials, ProviderId } from "@route-intel/types";
import { ProviderConstructionError } from "../errors.js";
import type { IntelligenceProvider } from "../providers/provider.js";
import {
  PROVIDER_CATALOG,
  secretOf,
  type ProviderDeclaration,
  type ProviderDependencies,
} from "./catalog.js";

export type Resolution =
  | {
      status: "eligible";
      declaration: ProviderDeclaration;
      /** @throws ProviderConstructionError */
      construct(): IntelligenceProvider;
    }
  | {
      status: "skipped";
      declaration: ProviderDeclaration;
      missingCredential: CredentialName;
    };

/** Capability table row, as exposed over HTTP */
export interface ProviderDescription {
  id: ProviderId;
  name: string;
  primaryCredential?: CredentialName;
  secondaryCredentials: CredentialName[];
  eligible: boolean;
}

export function isEligible(declaration: ProviderDeclaration, credentials: Credentials): boolean {
  return (
    declaration.primaryCredential === undefined ||
    secretOf(credentials, declaration.primaryCredential) !== undefined
  );
}

export class ProviderRegistry {
  readonly declarations: readonly ProviderDeclaration[];
  private readonly deps: ProviderDependencies;

  constructor(deps: ProviderDependencies, declarations: readonly ProviderDeclaration[] = PROVIDER_CATALOG) {
    this.deps = deps;
    this.declarations = declarations;
  }

  resolve(declaration: ProviderDeclaration, credentials: Credentials): Resolution {
    const missing = declaration.primaryCredential;
    if (missing !== undefined && !isEligible(declaration, credentials)) {
      return { status: "skipped", declaration, missingCredential: missing };
    }
    return {
      status: "eligible",
      declaration,
      construct: () => {
        try {
          return declaration.create(credentials, this.deps);
        } catch (err) {
          throw new ProviderConstructionError(declaration.id, err);
        }
      },
    };
  }

  /** Resolve every declaration, in canonical order */
  resolveAll(credentials: Credentials): Resolution[] {
    return this.declarations.map((d) => this.resolve(d, credentials));
  }

  describe(credentials: Credentials): ProviderDescription[] {
    return this.declarations.map((d) => ({
      id: d.id,
      name: d.name,
      primaryCredential: d.primaryCredential,
      secondaryCredentials: [...d.secondaryCredentials],
      eligible: isEligible(d, credentials),
    }));
  }
}

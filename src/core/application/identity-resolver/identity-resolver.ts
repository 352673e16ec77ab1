import { sortBy } from "remeda";
import type { IdentityBackend } from "@core/ports/identity-backend.types";
import { TransportError } from "@core/domain/errors";
import { logger } from "@infra/logger";
import type { IdentityResolver } from "./identity-resolver.types";

export function createIdentityResolver(backends: IdentityBackend[]): IdentityResolver {
  const ordered = sortBy(backends, (backend) => backend.priority);

  return {
    backends() {
      return ordered.map((backend) => backend.id);
    },
    async resolve(identity, scope) {
      const failures: Array<{ backend: string; error: unknown }> = [];

      for (const backend of ordered) {
        try {
          const found = await backend.findUser(identity, scope);
          if (found) {
            logger.info({ identity, backend: backend.id, principalId: found.principalId }, "[jit] Identity resolved.");
            return found;
          }
        } catch (error) {
          logger.debug({ error, identity, backend: backend.id }, "[jit] Identity backend lookup failed, trying next backend.");
          failures.push({ backend: backend.id, error });
        }
      }

      if (ordered.length > 0 && failures.length === ordered.length) {
        const last = failures[failures.length - 1];
        throw new TransportError(`Identity lookup for ${identity} (${failures.map((entry) => entry.backend).join(", ")})`, last?.error);
      }

      logger.info({ identity }, "[jit] No identity found.");
      return undefined;
    },
  };
}

export type { IdentityResolver } from "./identity-resolver.types";

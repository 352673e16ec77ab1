import type { PolicyCatalog } from "@core/ports/access-platform.types";
import { logger } from "@infra/logger";
import type { PolicyResolver } from "./policy-resolver.types";

export function createPolicyResolver(catalog: PolicyCatalog): PolicyResolver {
  return {
    async resolve(name, scope) {
      let nextToken: string | undefined;
      let pages = 0;

      do {
        const page = await catalog.listPage(scope, nextToken);
        pages += 1;
        // First match in catalog order wins; duplicates further on are ignored.
        const match = page.policies.find((policy) => policy.name === name);
        if (match) {
          logger.info({ name, arn: match.arn, pages }, "[jit] Permission set resolved.");
          return match;
        }
        nextToken = page.nextToken;
      } while (nextToken);

      logger.info({ name, pages }, "[jit] Permission set not found.");
      return undefined;
    },
  };
}

export type { PolicyResolver } from "./policy-resolver.types";

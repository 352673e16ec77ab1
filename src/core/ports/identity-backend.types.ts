import type { IdentitySource, PlatformInstance, ResolvedIdentity } from "../domain/access.types";

export type IdentityBackend = {
  id: IdentitySource;
  /** Lower values are queried first. */
  priority: number;
  findUser: (identity: string, scope: PlatformInstance) => Promise<ResolvedIdentity | undefined>;
};

import type { IdentitySource, PlatformInstance, ResolvedIdentity } from "@core/domain/access.types";

export type IdentityResolver = {
  resolve: (identity: string, scope: PlatformInstance) => Promise<ResolvedIdentity | undefined>;
  backends: () => IdentitySource[];
};

import type { PlatformInstance, ResolvedPolicy } from "@core/domain/access.types";

export type PolicyResolver = {
  resolve: (name: string, scope: PlatformInstance) => Promise<ResolvedPolicy | undefined>;
};

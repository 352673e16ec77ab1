import type { Grant, PlatformInstance, ResolvedPolicy } from "../domain/access.types";

export type AssignmentStatus = {
  status: "IN_PROGRESS" | "FAILED" | "SUCCEEDED" | "UNKNOWN";
  requestId?: string;
  failureReason?: string;
};

export interface AccessPlatform {
  listInstances(): Promise<PlatformInstance[]>;
  createAssignment(grant: Grant): Promise<AssignmentStatus>;
  deleteAssignment(grant: Grant): Promise<AssignmentStatus>;
}

export type PolicyPage = {
  policies: ResolvedPolicy[];
  nextToken?: string;
};

export interface PolicyCatalog {
  listPage(scope: PlatformInstance, nextToken?: string): Promise<PolicyPage>;
}

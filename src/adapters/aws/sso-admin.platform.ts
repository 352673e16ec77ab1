import {
  CreateAccountAssignmentCommand,
  DeleteAccountAssignmentCommand,
  DescribePermissionSetCommand,
  ListInstancesCommand,
  ListPermissionSetsCommand,
  PrincipalType,
  TargetType,
  type SSOAdminClient,
} from "@aws-sdk/client-sso-admin";
import type { Grant, PlatformInstance, ResolvedPolicy } from "@core/domain/access.types";
import type {
  AccessPlatform,
  AssignmentStatus,
  PolicyCatalog,
} from "@core/ports/access-platform.types";
import { logger } from "@infra/logger";
import { awsCall } from "./aws.errors";

type AssignmentStatusShape = {
  Status?: string;
  RequestId?: string;
  FailureReason?: string;
};

const KNOWN_STATUSES = ["IN_PROGRESS", "FAILED", "SUCCEEDED"] as const;

function isKnownStatus(value: string | undefined): value is (typeof KNOWN_STATUSES)[number] {
  return KNOWN_STATUSES.some((status) => status === value);
}

export function toAssignmentStatus(shape: AssignmentStatusShape | undefined): AssignmentStatus {
  const value = shape?.Status;
  return {
    status: isKnownStatus(value) ? value : "UNKNOWN",
    requestId: shape?.RequestId,
    failureReason: shape?.FailureReason,
  };
}

function assignmentTarget(grant: Grant) {
  return {
    InstanceArn: grant.instance.instanceArn,
    TargetId: grant.accountId,
    TargetType: TargetType.AWS_ACCOUNT,
    PermissionSetArn: grant.policyArn,
    PrincipalType: PrincipalType.USER,
    PrincipalId: grant.principalId,
  };
}

export function createSsoAdminPlatform(client: SSOAdminClient): AccessPlatform {
  return {
    async listInstances() {
      const instances: PlatformInstance[] = [];
      let nextToken: string | undefined;
      do {
        const response = await awsCall("ListInstances", () => client.send(new ListInstancesCommand({ NextToken: nextToken })));
        for (const instance of response.Instances ?? []) {
          if (instance.InstanceArn && instance.IdentityStoreId) {
            instances.push({ instanceArn: instance.InstanceArn, identityStoreId: instance.IdentityStoreId });
          }
        }
        nextToken = response.NextToken;
      } while (nextToken);
      return instances;
    },

    async createAssignment(grant) {
      const response = await awsCall("CreateAccountAssignment", () =>
        client.send(new CreateAccountAssignmentCommand(assignmentTarget(grant))),
      );
      const status = toAssignmentStatus(response.AccountAssignmentCreationStatus);
      logger.info({ requestId: status.requestId, status: status.status }, "[jit] Account assignment requested.");
      return status;
    },

    async deleteAssignment(grant) {
      const response = await awsCall("DeleteAccountAssignment", () =>
        client.send(new DeleteAccountAssignmentCommand(assignmentTarget(grant))),
      );
      const status = toAssignmentStatus(response.AccountAssignmentDeletionStatus);
      logger.info({ requestId: status.requestId, status: status.status }, "[jit] Account assignment deletion requested.");
      return status;
    },
  };
}

export function createSsoPolicyCatalog(client: SSOAdminClient): PolicyCatalog {
  const describe = async (instanceArn: string, permissionSetArn: string): Promise<ResolvedPolicy | undefined> => {
    const response = await awsCall("DescribePermissionSet", () =>
      client.send(new DescribePermissionSetCommand({ InstanceArn: instanceArn, PermissionSetArn: permissionSetArn })),
    );
    const name = response.PermissionSet?.Name;
    if (!name) {
      return undefined;
    }
    return { arn: permissionSetArn, name, description: response.PermissionSet?.Description };
  };

  return {
    async listPage(scope, nextToken) {
      const response = await awsCall("ListPermissionSets", () =>
        client.send(new ListPermissionSetsCommand({ InstanceArn: scope.instanceArn, NextToken: nextToken })),
      );
      // One DescribePermissionSet at a time; the SSO Admin API throttles bursts.
      const policies: ResolvedPolicy[] = [];
      for (const arn of response.PermissionSets ?? []) {
        const policy = await describe(scope.instanceArn, arn);
        if (policy) {
          policies.push(policy);
        }
      }
      return { policies, nextToken: response.NextToken };
    },
  };
}

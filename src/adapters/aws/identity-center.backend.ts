import { ListUsersCommand, type IdentitystoreClient } from "@aws-sdk/client-identitystore";
import type { IdentityBackend } from "@core/ports/identity-backend.types";
import { awsCall } from "./aws.errors";

export function createIdentityCenterBackend(client: IdentitystoreClient, priority = 0): IdentityBackend {
  return {
    id: "identity-center",
    priority,
    async findUser(identity, scope) {
      const response = await awsCall("ListUsers", () =>
        client.send(
          new ListUsersCommand({
            IdentityStoreId: scope.identityStoreId,
            Filters: [{ AttributePath: "UserName", AttributeValue: identity }],
          }),
        ),
      );

      const user = response.Users?.find((candidate) => candidate.UserId);
      if (!user?.UserId) {
        return undefined;
      }

      const email = user.Emails?.find((entry) => entry.Primary)?.Value ?? user.Emails?.[0]?.Value;
      return {
        principalId: user.UserId,
        displayName: user.DisplayName || user.UserName || identity,
        source: "identity-center",
        email,
      };
    },
  };
}

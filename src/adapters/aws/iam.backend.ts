import { ListUserTagsCommand, paginateListUsers, type IAMClient, type User } from "@aws-sdk/client-iam";
import type { ResolvedIdentity } from "@core/domain/access.types";
import type { IdentityBackend } from "@core/ports/identity-backend.types";
import { logger } from "@infra/logger";
import { awsCall } from "./aws.errors";

const EMAIL_TAG = "email";

function sameText(left: string | undefined, right: string): boolean {
  return left !== undefined && left.toLowerCase() === right.toLowerCase();
}

function toIdentity(user: User & { UserId: string }, email?: string): ResolvedIdentity {
  return {
    principalId: user.UserId,
    displayName: user.UserName ?? user.UserId,
    source: "iam",
    arn: user.Arn,
    email,
  };
}

export function createIamBackend(client: IAMClient, priority = 1): IdentityBackend {
  const emailTagOf = async (userName: string): Promise<string | undefined> => {
    try {
      const response = await client.send(new ListUserTagsCommand({ UserName: userName }));
      return response.Tags?.find((tag) => sameText(tag.Key, EMAIL_TAG))?.Value;
    } catch (error) {
      logger.debug({ error, userName }, "[jit] Could not read IAM user tags, skipping user.");
      return undefined;
    }
  };

  return {
    id: "iam",
    priority,
    async findUser(identity) {
      return awsCall("ListUsers", async () => {
        for await (const page of paginateListUsers({ client }, {})) {
          for (const user of page.Users ?? []) {
            if (!user.UserId || !user.UserName) {
              continue;
            }
            const withId = { ...user, UserId: user.UserId };
            if (sameText(user.UserName, identity)) {
              return toIdentity(withId);
            }
            const email = await emailTagOf(user.UserName);
            if (sameText(email, identity)) {
              return toIdentity(withId, email);
            }
          }
        }
        return undefined;
      });
    },
  };
}

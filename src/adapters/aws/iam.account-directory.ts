import { ListAccountAliasesCommand, type IAMClient } from "@aws-sdk/client-iam";
import type { AccountDirectory } from "@core/ports/account-directory.types";
import { awsCall } from "./aws.errors";

/** IAM only knows the alias of the calling account. */
export function createIamAccountDirectory(client: IAMClient): AccountDirectory {
  return {
    async getAccountAlias() {
      const response = await awsCall("ListAccountAliases", () => client.send(new ListAccountAliasesCommand({})));
      return response.AccountAliases?.[0];
    },
  };
}

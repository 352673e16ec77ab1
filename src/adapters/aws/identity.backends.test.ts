import { mockClient } from "aws-sdk-client-mock";
import { beforeEach, describe, expect, it } from "vitest";
import { IdentitystoreClient, ListUsersCommand as ListStoreUsersCommand } from "@aws-sdk/client-identitystore";
import { IAMClient, ListAccountAliasesCommand, ListUserTagsCommand, ListUsersCommand } from "@aws-sdk/client-iam";
import { createIamAccountDirectory } from "./iam.account-directory";
import { createIamBackend } from "./iam.backend";
import { createIdentityCenterBackend } from "./identity-center.backend";

const storeMock = mockClient(IdentitystoreClient);
const iamMock = mockClient(IAMClient);
const scope = { instanceArn: "arn:aws:sso:::instance/ssoins-test", identityStoreId: "d-test" };

beforeEach(() => {
  storeMock.reset();
  iamMock.reset();
});

describe("createIdentityCenterBackend", () => {
  const backend = createIdentityCenterBackend(new IdentitystoreClient({ region: "us-east-1" }));

  it("filters the identity store by user name", async () => {
    storeMock.on(ListStoreUsersCommand).resolves({
      Users: [
        {
          IdentityStoreId: "d-test",
          UserId: "user-1",
          UserName: "alice@example.com",
          DisplayName: "Alice Example",
          Emails: [{ Value: "alice@work.example.com" }, { Value: "alice@example.com", Primary: true }],
        },
      ],
    });

    await expect(backend.findUser("alice@example.com", scope)).resolves.toEqual({
      principalId: "user-1",
      displayName: "Alice Example",
      source: "identity-center",
      email: "alice@example.com",
    });
    expect(storeMock.commandCalls(ListStoreUsersCommand)[0]?.args[0].input).toEqual({
      IdentityStoreId: "d-test",
      Filters: [{ AttributePath: "UserName", AttributeValue: "alice@example.com" }],
    });
  });

  it("returns undefined when the store has no match", async () => {
    storeMock.on(ListStoreUsersCommand).resolves({ Users: [] });

    await expect(backend.findUser("ghost@example.com", scope)).resolves.toBeUndefined();
  });
});

describe("createIamBackend", () => {
  const backend = createIamBackend(new IAMClient({ region: "us-east-1" }));
  const created = new Date("2024-01-01T00:00:00Z");

  it("matches user names case-insensitively without reading tags", async () => {
    iamMock.on(ListUsersCommand).resolves({
      Users: [{ UserName: "Bob", UserId: "AIDABOB", Arn: "arn:aws:iam::123456789012:user/Bob", Path: "/", CreateDate: created }],
    });

    await expect(backend.findUser("bob", scope)).resolves.toEqual({
      principalId: "AIDABOB",
      displayName: "Bob",
      source: "iam",
      arn: "arn:aws:iam::123456789012:user/Bob",
    });
    expect(iamMock.commandCalls(ListUserTagsCommand)).toHaveLength(0);
  });

  it("matches the email tag and skips users whose tags cannot be read", async () => {
    iamMock
      .on(ListUsersCommand, { Marker: undefined })
      .resolves({
        Users: [{ UserName: "locked", UserId: "AIDALOCKED", Arn: "arn:aws:iam::123456789012:user/locked", Path: "/", CreateDate: created }],
        IsTruncated: true,
        Marker: "m1",
      })
      .on(ListUsersCommand, { Marker: "m1" })
      .resolves({
        Users: [{ UserName: "carol", UserId: "AIDACAROL", Arn: "arn:aws:iam::123456789012:user/carol", Path: "/", CreateDate: created }],
        IsTruncated: false,
      })
      .on(ListUserTagsCommand, { UserName: "locked" })
      .rejects(new Error("AccessDenied"))
      .on(ListUserTagsCommand, { UserName: "carol" })
      .resolves({ Tags: [{ Key: "Email", Value: "Carol@Example.com" }] });

    await expect(backend.findUser("carol@example.com", scope)).resolves.toEqual({
      principalId: "AIDACAROL",
      displayName: "carol",
      source: "iam",
      arn: "arn:aws:iam::123456789012:user/carol",
      email: "Carol@Example.com",
    });
  });

  it("surfaces listing failures", async () => {
    iamMock.on(ListUsersCommand).rejects(new Error("Throttling"));

    await expect(backend.findUser("bob", scope)).rejects.toThrow("ListUsers failed: Throttling");
  });
});

describe("createIamAccountDirectory", () => {
  it("returns the first account alias", async () => {
    iamMock.on(ListAccountAliasesCommand).resolves({ AccountAliases: ["sandbox"], IsTruncated: false });

    await expect(createIamAccountDirectory(new IAMClient({ region: "us-east-1" })).getAccountAlias("123456789012")).resolves.toBe(
      "sandbox",
    );
  });

  it("returns undefined without aliases", async () => {
    iamMock.on(ListAccountAliasesCommand).resolves({ AccountAliases: [] });

    await expect(createIamAccountDirectory(new IAMClient({ region: "us-east-1" })).getAccountAlias("123456789012")).resolves.toBeUndefined();
  });
});

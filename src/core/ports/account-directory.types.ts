export interface AccountDirectory {
  getAccountAlias(accountId: string): Promise<string | undefined>;
}

/**
 * One forced token refresh per tool invocation. Requests rejected with the
 * same token share that refresh; once it is spent, a rejection of any other
 * token is final.
 */
export class RefreshBudget {
  private rejectedToken?: string;
  private refreshed?: Promise<string>;

  /**
   * Returns the replacement for `rejectedToken`, starting the refresh on
   * first use. Returns undefined when the budget is already spent on a
   * different token.
   */
  spend(
    rejectedToken: string,
    refresh: () => Promise<string>,
  ): Promise<string> | undefined {
    if (!this.refreshed) {
      this.rejectedToken = rejectedToken;
      this.refreshed = refresh();
      return this.refreshed;
    }
    return this.rejectedToken === rejectedToken ? this.refreshed : undefined;
  }
}

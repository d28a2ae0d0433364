/**
 * Interactive input the core receives by injection, so flows run headless in tests.
 */
export interface PassphrasePrompter {
  /**
   * Ask for a passphrase without echoing it.
   * With `confirm`, ask twice and reject a mismatch.
   */
  passphrase(message: string, options?: { confirm?: boolean }): Promise<string>;
  /** Yes/no question; anything but y/yes is "no". */
  confirm(message: string): Promise<boolean>;
}

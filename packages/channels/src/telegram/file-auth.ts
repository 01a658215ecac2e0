/**
 * File-based login
 *
 * Answers the client's login prompts without a terminal: the phone number
 * comes from configuration, the login code and the second-factor password
 * from secret-exchange files the operator writes.
 */

import {
  AuthenticationError,
  awaitSecret,
  getErrorMessage,
  type AwaitSecretOptions,
} from '@docdrop/core';
import { getLog } from '../log.js';

const log = getLog('FileAuth');

/** Login errors tolerated before the handshake is abandoned */
const MAX_LOGIN_ERRORS = 3;

export interface FileAuthenticatorOptions {
  phone: string;
  codeFile: string;
  passwordFile: string;
  /** Passed to every secret wait */
  wait?: AwaitSecretOptions;
  /** Replaces the secret-file wait (tests) */
  awaitSecret?: (path: string, options?: AwaitSecretOptions) => Promise<string>;
}

export class FileAuthenticator {
  private readonly options: FileAuthenticatorOptions;
  private readonly wait: (path: string, options?: AwaitSecretOptions) => Promise<string>;
  private fatal: Error | null = null;
  private errors = 0;

  constructor(options: FileAuthenticatorOptions) {
    this.options = options;
    this.wait = options.awaitSecret ?? awaitSecret;
  }

  /**
   * The failure that ended the handshake, if one did.
   */
  get failure(): Error | null {
    return this.fatal;
  }

  async phoneNumber(): Promise<string> {
    return this.options.phone;
  }

  async phoneCode(isCodeViaApp?: boolean): Promise<string> {
    const via = isCodeViaApp ? 'in the Telegram app' : 'by SMS';
    log.info(`Login code sent ${via}. Write it to ${this.options.codeFile}`);
    return this.secret(this.options.codeFile);
  }

  async password(hint?: string): Promise<string> {
    log.info(
      `Two-factor authentication is enabled${hint ? ` (hint: ${hint})` : ''}. ` +
        `Write the password to ${this.options.passwordFile}`
    );
    return this.secret(this.options.passwordFile);
  }

  /**
   * Registering a new account is never done here.
   */
  async signUp(): Promise<never> {
    const error = new AuthenticationError(
      `No account exists for ${this.options.phone}; sign-up is not supported`
    );
    this.fatal = error;
    throw error;
  }

  /**
   * Called by the client for every failed step.
   * Resolves true to abandon the handshake, false to retry the step.
   */
  async onError(error: Error): Promise<boolean> {
    if (this.fatal) return true;

    this.errors++;
    log.warn(`Login step failed: ${getErrorMessage(error)}`);
    if (this.errors >= MAX_LOGIN_ERRORS) {
      this.fatal = new AuthenticationError(`Login failed after ${this.errors} attempts`, { cause: error });
      return true;
    }
    return false;
  }

  private async secret(path: string): Promise<string> {
    try {
      return await this.wait(path, this.options.wait);
    } catch (error) {
      this.fatal =
        error instanceof Error ? error : new AuthenticationError(`Waiting for ${path} failed`, { cause: error });
      throw error;
    }
  }
}

import bcrypt from "bcrypt";
import { randomInt } from "crypto";
import { config } from "../config";
import { TEMPORARY_PASSWORD_LENGTH } from "../types/constants";

const ALPHANUMERIC =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

export class PasswordService {
  constructor(private readonly saltRounds: number = config.bcryptSaltRounds) {}

  /**
   * Hash a password using bcrypt
   * @param password - The plaintext password to hash
   * @returns The hashed password
   */
  async hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.saltRounds);
  }

  /**
   * Verify a password against a hash
   * @param password - The plaintext password to verify
   * @param hash - The bcrypt hash to compare against
   * @returns True if password matches, false otherwise
   */
  async verify(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }

  /**
   * Generate a random alphanumeric temporary password
   */
  generateTemporaryPassword(length: number = TEMPORARY_PASSWORD_LENGTH): string {
    let password = "";
    for (let i = 0; i < length; i++) {
      password += ALPHANUMERIC.charAt(randomInt(ALPHANUMERIC.length));
    }
    return password;
  }
}

export const passwordService = new PasswordService();

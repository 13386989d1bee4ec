import { Injectable } from '@nestjs/common';
import { randomBytes, scrypt } from 'crypto';

export const PASSWORD_HASHER = Symbol('PASSWORD_HASHER');

/**
 * Produces the stored password hash. Credentials are checked by the
 * authentication gateway.
 */
export interface PasswordHasher {
  hash(password: string): Promise<string>;
}

const SALT_BYTES = 16;
const KEY_LENGTH = 64;

/**
 * Stores hashes as `scrypt$<salt>$<key>`, both parts base64.
 */
@Injectable()
export class ScryptPasswordHasher implements PasswordHasher {
  async hash(password: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const key = await this.derive(password, salt);
    return `scrypt$${salt.toString('base64')}$${key.toString('base64')}`;
  }

  private derive(password: string, salt: Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      scrypt(password, salt, KEY_LENGTH, (error, key) => {
        if (error) {
          reject(error);
        } else {
          resolve(key);
        }
      });
    });
  }
}

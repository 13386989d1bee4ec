import { ScryptPasswordHasher } from './password-hasher';

describe('ScryptPasswordHasher', () => {
  const hasher = new ScryptPasswordHasher();

  it('should store a base64 salt and key under the scrypt scheme', async () => {
    const hash = await hasher.hash('test-password');
    const [scheme, salt, key] = hash.split('$');

    expect(scheme).toBe('scrypt');
    expect(Buffer.from(salt, 'base64')).toHaveLength(16);
    expect(Buffer.from(key, 'base64')).toHaveLength(64);
  });

  it('should never store the password itself', async () => {
    const hash = await hasher.hash('test-password');

    expect(hash.includes('test-password')).toBe(false);
  });

  it('should salt every hash', async () => {
    const [first, second] = await Promise.all([
      hasher.hash('test-password'),
      hasher.hash('test-password'),
    ]);

    expect(first).not.toBe(second);
  });
});

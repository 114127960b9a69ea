/* eslint-disable no-console */
import { hashPassword } from '../src/lib/auth';

// Prints a bcrypt hash for ADMIN_PASSWORD_HASH. Usage: npm run auth:hash -- <password>
async function main() {
  const password = process.argv[2];
  if (!password) {
    throw new Error('Pass the password as the first argument');
  }
  console.log(await hashPassword(password));
}

main().catch((err) => {
  console.error('[auth:hash] Failed:', err);
  process.exit(1);
});

import { readFileSync, existsSync } from 'fs';
import path from 'path';

type Env = Record<string, string | undefined>;

const DEFAULT_SECRETS_DIR = '/run/secrets';

/**
 * Read a secret from a Docker secret file, falling back to an environment variable.
 * Docker mounts secrets at /run/secrets/<name>.
 */
export function getSecret(
  name: string,
  fallbackEnv: string,
  env: Env = process.env,
  secretsDir: string = DEFAULT_SECRETS_DIR
): string {
  const secretPath = path.join(secretsDir, name);

  if (existsSync(secretPath)) {
    try {
      return readFileSync(secretPath, 'utf8').trim();
    } catch {
      const fromEnv = env[fallbackEnv];
      if (fromEnv) {
        return fromEnv;
      }
      throw new Error(`Secret "${name}" exists but could not be read at ${secretPath}`);
    }
  }

  const fromEnv = env[fallbackEnv];
  if (fromEnv) {
    return fromEnv;
  }

  throw new Error(`Secret "${name}" not found at ${secretPath} and ${fallbackEnv} is not set`);
}

/**
 * Read an optional secret - returns undefined if not found.
 */
export function getOptionalSecret(
  name: string,
  fallbackEnv: string,
  env: Env = process.env,
  secretsDir: string = DEFAULT_SECRETS_DIR
): string | undefined {
  try {
    return getSecret(name, fallbackEnv, env, secretsDir);
  } catch {
    return undefined;
  }
}

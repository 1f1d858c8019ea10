import { tmpdir } from 'os';
import { join } from 'path';

const defaults: Record<string, string> = {
  NODE_ENV: 'test',
  DB_PATH: join(tmpdir(), 'signage-fleet-test', 'hosts.db'),
  IDENTITY_FILE: join(tmpdir(), 'signage-fleet-test', 'identity.id'),
  LOG_DIR: join(tmpdir(), 'signage-fleet-test', 'logs'),
  LOG_LEVEL: 'error',
  SWEEP_ENABLED: 'false',
  DOTENV_CONFIG_QUIET: 'true',
};

for (const [key, value] of Object.entries(defaults)) {
  if (!process.env[key]) {
    process.env[key] = value;
  }
}

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

function resolveHomeDir(): string {
  const homeFromEnv = process.env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

/**
 * Config directory: $CMDWISE_CONFIG_DIR, else $XDG_CONFIG_HOME/cmdwise, else ~/.config/cmdwise.
 * Created on first use.
 */
export function getConfigDir(): string {
  const override = process.env.CMDWISE_CONFIG_DIR;
  const configDir =
    typeof override === 'string' && override.trim()
      ? override
      : path.join(
          typeof process.env.XDG_CONFIG_HOME === 'string' && process.env.XDG_CONFIG_HOME.trim()
            ? process.env.XDG_CONFIG_HOME
            : path.join(resolveHomeDir(), '.config'),
          'cmdwise'
        );

  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }
  return configDir;
}

export function getLogDir(): string {
  return path.join(getConfigDir(), 'logs');
}

export function getHistoryPath(): string {
  return path.join(getConfigDir(), 'history');
}

export function getAttemptLogPath(): string {
  return path.join(getConfigDir(), 'attempts.jsonl');
}

import * as os from 'os';
import * as path from 'path';

export interface HostInfo {
  platform: string;
  /** Human-readable OS name, e.g. "macOS", "Linux" */
  osName: string;
  release: string;
  arch: string;
  shell: string;
  cwd: string;
  user: string;
}

const OS_NAMES: Record<string, string> = {
  darwin: 'macOS',
  linux: 'Linux',
  win32: 'Windows',
  freebsd: 'FreeBSD',
  openbsd: 'OpenBSD',
};

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    // userInfo throws when the uid has no passwd entry (some containers)
    return process.env.USER || process.env.USERNAME || 'unknown';
  }
}

export function getHostInfo(): HostInfo {
  const platform = os.platform();
  const shellPath = process.env.SHELL || (platform === 'win32' ? process.env.ComSpec || 'cmd.exe' : '/bin/sh');

  return {
    platform,
    osName: OS_NAMES[platform] ?? os.type(),
    release: os.release(),
    arch: os.arch(),
    shell: path.basename(shellPath),
    cwd: process.cwd(),
    user: currentUser(),
  };
}

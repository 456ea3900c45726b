import os from 'node:os';
import path from 'node:path';

export const getAppDataDir = (appName: string, env: NodeJS.ProcessEnv = process.env): string => {
  if (process.platform === 'win32') {
    const base = env.LOCALAPPDATA || env.APPDATA;
    if (base) {
      return path.join(base, appName);
    }
  }

  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', appName);
  }

  const xdgDataHome = env.XDG_DATA_HOME;
  if (xdgDataHome) {
    return path.join(xdgDataHome, appName);
  }

  return path.join(os.homedir(), '.local', 'share', appName);
};

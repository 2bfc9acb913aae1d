import * as os from 'os';
import * as path from 'path';
import { UsageError } from '../../config_store';

/**
 * Per-user configuration root:
 * - Linux and other Unix: `$XDG_CONFIG_HOME`, else `~/.config`
 * - macOS: `~/Library/Application Support`
 * - Windows: `%APPDATA%`
 */
export function userConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
): string {
  switch (platform) {
    case 'win32': {
      const appData = env['APPDATA'];
      if (!appData) {
        throw new UsageError('%APPDATA% is not set');
      }
      return appData;
    }
    case 'darwin':
      return path.join(home, 'Library', 'Application Support');
    default: {
      const xdg = env['XDG_CONFIG_HOME'];
      // Relative values are invalid per the XDG spec and ignored
      if (xdg && path.isAbsolute(xdg)) return xdg;
      return path.join(home, '.config');
    }
  }
}

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

function resolveHomeDir(env: NodeJS.ProcessEnv): string {
  const homeFromEnv = env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

/**
 * TICKGRAPH_CONFIG_DIR, else $XDG_CONFIG_HOME/tickgraph, else ~/.config/tickgraph.
 * An explicit override is created on first use.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TICKGRAPH_CONFIG_DIR;
  if (typeof override === 'string' && override.trim()) {
    if (!fs.existsSync(override)) {
      fs.mkdirSync(override, { recursive: true, mode: 0o700 });
    }
    return override;
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME;
  const baseDir =
    typeof xdgConfigHome === 'string' && xdgConfigHome.trim()
      ? xdgConfigHome
      : path.join(resolveHomeDir(env), '.config');
  return path.join(baseDir, 'tickgraph');
}

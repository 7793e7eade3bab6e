import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

export const APP_NAME = 'stepline';
export const CONFIG_ENV_VAR = 'STEPLINE_CONFIG';

export class PathResolver {
  /**
   * Get the project-local .stepline directory
   */
  static getProjectDir(): string {
    return resolve(process.cwd(), `.${APP_NAME}`);
  }

  /**
   * Get the XDG config directory
   * Priority: $XDG_CONFIG_HOME/stepline or ~/.config/stepline
   */
  static getUserConfigDir(): string {
    const xdgConfigHome = process.env.XDG_CONFIG_HOME;
    if (xdgConfigHome) {
      return join(xdgConfigHome, APP_NAME);
    }
    return join(homedir(), '.config', APP_NAME);
  }

  /**
   * Get potential configuration file paths in order of precedence
   */
  static getConfigPaths(): string[] {
    const paths: string[] = [];

    const fromEnv = process.env[CONFIG_ENV_VAR];
    if (fromEnv) {
      paths.push(resolve(fromEnv));
    }

    const projectDir = PathResolver.getProjectDir();
    paths.push(join(projectDir, 'config.yaml'));
    paths.push(join(projectDir, 'config.yml'));

    const userConfigDir = PathResolver.getUserConfigDir();
    paths.push(join(userConfigDir, 'config.yaml'));
    paths.push(join(userConfigDir, 'config.yml'));

    return paths;
  }

  /**
   * Resolve a path referenced from inside a workflow file (e.g. a schema_file)
   * against the workflow's own directory.
   */
  static resolveFromWorkflow(target: string, workflowDir?: string): string {
    if (isAbsolute(target)) return target;
    return resolve(workflowDir ?? process.cwd(), target);
  }
}

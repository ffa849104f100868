/**
 * Environment variable allowlist for subprocess execution
 *
 * Subprocesses (git, diff) get a minimal environment built from
 * allowed variables only, never the full process environment.
 */

/**
 * Allowed environment variables for Unix platforms
 */
const UNIX_ALLOWED = [
  'PATH',
  'HOME',
  'USER',
  'TERM',
  'LANG',
  'SSH_AUTH_SOCK',
  'HTTPS_PROXY',
  'NO_PROXY',
];

/**
 * Additional allowed environment variables for Windows/WSL
 */
const WINDOWS_ADDITIONAL = [
  'USERPROFILE',
  'APPDATA',
  'LOCALAPPDATA',
  'TEMP',
  'TMP',
  'SystemRoot',
  'COMSPEC',
];

/**
 * Check if running on Windows
 */
function isWindows(): boolean {
  return process.platform === 'win32';
}

/**
 * Get the list of allowed environment variable names for the current platform
 */
export function getAllowedEnvNames(): string[] {
  const allowed = [...UNIX_ALLOWED];

  if (isWindows()) {
    allowed.push(...WINDOWS_ADDITIONAL);
  }

  return allowed;
}

/**
 * Build a minimal environment object from the allowed list
 * Also includes any RULEGEN_* and GIT_* prefixed variables
 */
export function getAllowedEnv(): NodeJS.ProcessEnv {
  const allowedNames = getAllowedEnvNames();
  const result: NodeJS.ProcessEnv = {};

  // Add explicitly allowed variables
  for (const name of allowedNames) {
    if (process.env[name] !== undefined) {
      result[name] = process.env[name];
    }
  }

  // Add RULEGEN_* and GIT_* prefixed variables
  for (const [key, value] of Object.entries(process.env)) {
    if ((key.startsWith('RULEGEN_') || key.startsWith('GIT_')) && value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

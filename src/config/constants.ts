/**
 * Default configuration values for fork orchestration.
 * These constants provide the defaults for every configuration section.
 */

// Config file and directory names
export const CONFIG_DIR_NAME = '.sandbox-forks' as const;
export const CONFIG_FILE_NAME = 'settings.json' as const;
export const CONFIG_VERSION = '1.0' as const;
export const CONFIG_FILE_PERMISSIONS = 0o600;

// Model aliases
export const MODEL_ALIASES = ['sonnet', 'opus', 'haiku'] as const;
export type ModelAlias = (typeof MODEL_ALIASES)[number];

export const DEFAULT_MODEL: ModelAlias = 'sonnet';

export const DEFAULT_MODEL_IDENTIFIERS: Record<ModelAlias, string> = {
  sonnet: 'claude-sonnet-4-5-20250929',
  opus: 'claude-opus-4-20250514',
  haiku: 'claude-3-5-haiku-20241022',
};

// Approximate pricing in USD per million tokens
export const DEFAULT_PRICING_RATES: Record<string, number> = {
  'claude-sonnet-4-5-20250929': 3.0,
  'claude-opus-4-20250514': 15.0,
  'claude-3-5-haiku-20241022': 1.0,
};
export const DEFAULT_PRICING_FALLBACK = 3.0;

// Fork execution limits
export const MAX_FORKS = 100;
export const THREAD_POOL_MAX_WORKERS = 10;
export const MAX_AGENT_TURNS = 100;
export const MAX_TOOL_CALLS_PER_TURN = 50;
export const DEFAULT_MAX_TOKENS = 8192;
export const DEFAULT_LOG_DIR = './logs';

// Bash tool (2 minutes is also the ceiling)
export const BASH_TIMEOUT_MS = 120_000;

// Grep tool
export const GREP_MAX_RESULTS = 100;

// Security defaults
export const DEFAULT_MAX_FILE_SIZE_MB = 100;
export const DEFAULT_STRICT_PATH_VALIDATION = true;

export const DEFAULT_ALLOWED_PATHS = [
  'temp/',
  'specs/',
  'workspace/',
  'src/',
  'tests/',
  'docs/',
  'scripts/',
  'config/',
  'data/',
];

export const DEFAULT_BLOCKED_PATHS = [
  '/etc/',
  '/var/',
  '/usr/',
  '/bin/',
  '/sbin/',
  '/boot/',
  '/sys/',
  '/proc/',
  '~/.ssh/',
  '~/.aws/',
  '~/.config/',
];

export const DEFAULT_BLOCKED_COMMANDS = [
  'rm -rf /',
  'rm -rf /*',
  'sudo rm',
  'mkfs',
  'dd if=',
  ':(){ :|:& };:',
  'chmod 000',
  'chown root',
  'mkfs.ext4',
  'fdisk',
  'parted',
  'shutdown',
  'reboot',
  'halt',
  'poweroff',
];

export const DEFAULT_BLOCKED_COMMAND_PATTERNS = [
  'rm\\s+-rf\\s+/',
  'sudo\\s+rm',
  'mkfs',
  'dd\\s+if=',
  'chmod\\s+000',
  'shutdown',
  'reboot',
  'halt',
  'poweroff',
];

// Shell idioms that leave the sandbox root; logged, never rejected
export const DEFAULT_ESCAPE_IDIOMS = ['cd /', 'cd ~', 'cd $HOME', '../../../', 'pushd /', 'popd'];

// Logging
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

// Telemetry defaults
export const DEFAULT_TELEMETRY_ENABLED = false;
export const DEFAULT_ENABLE_SENSITIVE_DATA = false;

// Retry defaults
export const DEFAULT_RETRY_ENABLED = true;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 2000;
export const DEFAULT_MAX_DELAY_MS = 10000;
export const DEFAULT_ENABLE_JITTER = true;

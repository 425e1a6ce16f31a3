import fs from 'node:fs';
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, setLogLevel } from './logger.js';
import {
  ConfigManager,
  DEFAULT_CONFIG_PATH,
  parseScopes,
  parseStorageBackend,
  validateConfig,
  type CenConfig
} from './config/index.js';
import { AuthorizationError, ConfigurationError, MailSendError } from './errors.js';
import { createServices, type CenServices, type ServiceOverrides } from './app.js';
import { runMonitor, type MonitorOptions, type MonitorResult } from './monitor.js';
import type { AuthorizationMode } from './types.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDependencies = {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  services?: ServiceOverrides;
  createServices?: (config: CenConfig, overrides: ServiceOverrides) => CenServices;
  runMonitor?: (options: MonitorOptions) => Promise<MonitorResult>;
};

type OptionKind = 'string' | 'number' | 'boolean';

type OptionSpec = {
  name: string;
  kind: OptionKind;
  alias?: string;
  negatable?: boolean;
};

type OptionValue = string | number | boolean;

type ParsedOptions = {
  values: Map<string, OptionValue>;
  help: boolean;
  errors: string[];
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const GLOBAL_OPTIONS: readonly OptionSpec[] = [
  { name: 'config', kind: 'string', alias: '-c' },
  { name: 'log-level', kind: 'string' },
  { name: 'client-id', kind: 'string' },
  { name: 'client-secret', kind: 'string' },
  { name: 'storage', kind: 'string' },
  { name: 'scopes', kind: 'string' }
];

// Every command that may need a credential can start the consent flow.
const AUTH_OPTIONS: readonly OptionSpec[] = [
  { name: 'console', kind: 'boolean' },
  { name: 'open-browser', kind: 'boolean', negatable: true },
  { name: 'login-hint', kind: 'string' }
];

const LOGIN_OPTIONS: readonly OptionSpec[] = [{ name: 'force', kind: 'boolean' }, ...AUTH_OPTIONS];

const TEST_EMAIL_OPTIONS: readonly OptionSpec[] = [
  { name: 'to', kind: 'string' },
  { name: 'subject', kind: 'string' },
  { name: 'body', kind: 'string' },
  { name: 'sender', kind: 'string' },
  ...AUTH_OPTIONS
];

const MONITOR_OPTIONS: readonly OptionSpec[] = [
  { name: 'device-index', kind: 'number' },
  { name: 'sensitivity', kind: 'number' },
  { name: 'min-interval-seconds', kind: 'number' },
  { name: 'to', kind: 'string' },
  { name: 'sender', kind: 'string' },
  { name: 'snapshot', kind: 'boolean', negatable: true },
  { name: 'subject', kind: 'string' },
  { name: 'body', kind: 'string' },
  { name: 'hourly-summary', kind: 'boolean', negatable: true },
  { name: 'anomaly-threshold', kind: 'number' },
  ...AUTH_OPTIONS
];

const DEFAULT_TEST_SUBJECT = 'CEN test email';
const DEFAULT_TEST_BODY = 'Hello from CEN';

const GLOBAL_USAGE = [
  'Global options:',
  '  -c, --config <path>        Configuration file (default: config/default.json)',
  '  --log-level <level>        Override the log level',
  '  --client-id <id>           Google OAuth client id (env: GOOGLE_CLIENT_ID)',
  '  --client-secret <secret>   Google OAuth client secret (env: GOOGLE_CLIENT_SECRET)',
  '  --storage <keyring|file>   Token storage backend (env: CEN_TOKEN_STORAGE)',
  '  --scopes <list>            Comma-separated OAuth scopes',
  '  -h, --help                 Show help'
];

const USAGE_LINES = [
  'CEN - Camera Event Notifier',
  '',
  'Usage:',
  '  cen login          Sign in with Google and store the tokens',
  '  cen export-token   Print the authorized user JSON (for CEN_GMAIL_TOKEN_JSON)',
  '  cen test-email     Send a test email through the Gmail API',
  '  cen monitor        Watch the camera and email on motion',
  '  cen help           Show this help message',
  '',
  ...GLOBAL_USAGE
];

const AUTH_USAGE = [
  'Authorization options (used when a new consent is needed):',
  '  --console                  Print the URL instead of opening a browser (headless hosts)',
  '  --open-browser             Open the browser automatically (default: on; --no-open-browser)',
  '  --login-hint <email>       Suggest an account on the Google screen (env: GMAIL_LOGIN_HINT)'
];

const LOGIN_USAGE = [
  'Usage: cen login [options]',
  '',
  'Options:',
  '  --force                    Force re-consent and get a new refresh token',
  '',
  ...AUTH_USAGE,
  '',
  ...GLOBAL_USAGE
].join('\n');

const EXPORT_TOKEN_USAGE = [
  'Usage: cen export-token [options]',
  '',
  ...AUTH_USAGE,
  '',
  ...GLOBAL_USAGE
].join('\n');

const TEST_EMAIL_USAGE = [
  'Usage: cen test-email --to <email> [options]',
  '',
  'Options:',
  '  --to <email>       Recipient',
  `  --subject <text>   Subject (default: ${DEFAULT_TEST_SUBJECT})`,
  `  --body <text>      Body (default: ${DEFAULT_TEST_BODY})`,
  '  --sender <email>   Override the sender (env: GMAIL_SENDER)',
  '',
  ...AUTH_USAGE,
  '',
  ...GLOBAL_USAGE
].join('\n');

const MONITOR_USAGE = [
  'Usage: cen monitor --to <email> [options]',
  '',
  'Options:',
  '  --device-index <n>           Camera device index (default: 0)',
  '  --sensitivity <area>         Minimum contour area to trigger motion (default: 500)',
  '  --min-interval-seconds <s>   Minimum seconds between notifications (default: 60)',
  '  --to <email>                 Recipient (env: CEN_NOTIFY_TO)',
  '  --sender <email>             Override the sender (env: GMAIL_SENDER)',
  '  --snapshot                   Attach a JPEG snapshot to each notification',
  '  --subject <text>             Notification subject',
  '  --body <text>                Notification body',
  '  --hourly-summary             Email a statistics summary every period',
  '  --anomaly-threshold <n>      Contour count that marks an event as an anomaly (default: 5)',
  '',
  ...AUTH_USAGE,
  '',
  ...GLOBAL_USAGE
].join('\n');

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  deps: CliDependencies = {}
): Promise<number> {
  const [command, ...rest] = argv;

  switch (command) {
    case 'login': {
      return runCommand(rest, LOGIN_OPTIONS, LOGIN_USAGE, io, deps, runLogin);
    }
    case 'export-token': {
      return runCommand(rest, [], EXPORT_TOKEN_USAGE, io, deps, runExportToken);
    }
    case 'test-email': {
      return runCommand(rest, TEST_EMAIL_OPTIONS, TEST_EMAIL_USAGE, io, deps, runTestEmail);
    }
    case 'monitor': {
      return runCommand(rest, MONITOR_OPTIONS, MONITOR_USAGE, io, deps, runMonitorCommand);
    }
    case undefined:
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

type CommandContext = {
  options: Map<string, OptionValue>;
  config: CenConfig;
  io: CliIo;
  deps: CliDependencies;
  signal: AbortSignal;
};

type CommandHandler = (context: CommandContext) => Promise<number>;

async function runCommand(
  args: string[],
  specs: readonly OptionSpec[],
  usage: string,
  io: CliIo,
  deps: CliDependencies,
  handler: CommandHandler
): Promise<number> {
  const parsed = parseOptions(args, [...GLOBAL_OPTIONS, ...specs]);
  if (parsed.help) {
    io.stdout.write(`${usage}\n`);
    return 0;
  }

  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    io.stderr.write(`${usage}\n`);
    return 1;
  }

  const controller = new AbortController();
  const releaseSignals = deps.signal
    ? forwardAbort(deps.signal, controller)
    : registerSignalHandlers(controller);

  try {
    const logLevel = getString(parsed.values, 'log-level');
    if (logLevel) {
      applyLogLevel(logLevel);
    }
    const config = withOAuthFlags(
      resolveConfig(parsed.values, deps.env ?? process.env),
      parsed.values
    );
    if (!logLevel) {
      applyLogLevel(config.logging.level);
    }
    return await handler({ options: parsed.values, config, io, deps, signal: controller.signal });
  } catch (error) {
    return reportError(error, io);
  } finally {
    releaseSignals();
  }
}

async function runLogin(context: CommandContext): Promise<number> {
  const { options, config, io } = context;
  const services = buildServices(config, context);

  await services.store.login(services.backend, {
    force: getBoolean(options, 'force') ?? false,
    mode: authorizationMode(options),
    loginHint: config.oauth.loginHint,
    signal: context.signal
  });
  io.stdout.write('Login completed and credentials stored.\n');
  return 0;
}

async function runExportToken(context: CommandContext): Promise<number> {
  const { options, config, io } = context;
  const services = buildServices(config, context);
  const credential = await services.store.ensureValid(services.backend, {
    mode: authorizationMode(options),
    loginHint: config.oauth.loginHint,
    signal: context.signal
  });
  io.stdout.write(`${credential.serialize()}\n`);
  return 0;
}

async function runTestEmail(context: CommandContext): Promise<number> {
  const { options, config, io } = context;
  const to = getString(options, 'to') ?? config.notifications.to;
  if (!to) {
    throw new ConfigurationError('A recipient address is required (--to)');
  }

  const services = buildServices(config, context);
  await services.store.ensureValid(services.backend, {
    mode: authorizationMode(options),
    loginHint: config.oauth.loginHint,
    signal: context.signal
  });
  const messageId = await services.transport.send({
    to,
    from: getString(options, 'sender') ?? config.notifications.from,
    subject: getString(options, 'subject') ?? DEFAULT_TEST_SUBJECT,
    body: getString(options, 'body') ?? DEFAULT_TEST_BODY
  });
  logger.info({ messageId, to }, 'Test email sent');
  io.stdout.write('Test email sent.\n');
  return 0;
}

async function runMonitorCommand(context: CommandContext): Promise<number> {
  const { options, io } = context;
  const config = withMonitorFlags(context.config, options);
  validateConfig(config);
  const services = buildServices(config, context);
  const monitor = context.deps.runMonitor ?? runMonitor;

  io.stdout.write('Starting motion detection. Press Ctrl+C to stop.\n');
  const result = await monitor({
    config,
    services,
    mode: authorizationMode(options),
    signal: context.signal
  });

  if (context.signal.aborted) {
    io.stdout.write('Stopping monitor...\n');
  }
  io.stdout.write(
    `Events: ${result.events}, sent: ${result.sent}, suppressed: ${result.suppressed}, failed: ${result.failed}\n`
  );
  return 0;
}

function buildServices(config: CenConfig, context: CommandContext): CenServices {
  const factory = context.deps.createServices ?? createServices;
  return factory(config, {
    env: context.deps.env,
    output: context.io.stdout,
    mode: authorizationMode(context.options),
    signal: context.signal,
    ...context.deps.services
  });
}

function authorizationMode(options: Map<string, OptionValue>): AuthorizationMode {
  return getBoolean(options, 'console') ? 'console' : 'local_server';
}

function resolveConfig(options: Map<string, OptionValue>, env: NodeJS.ProcessEnv): CenConfig {
  const manager = new ConfigManager(getString(options, 'config') ?? DEFAULT_CONFIG_PATH, env);
  const config = manager.getConfig();
  const oauth = { ...config.oauth };

  const clientId = getString(options, 'client-id');
  if (clientId) {
    oauth.clientId = clientId;
  }
  const clientSecret = getString(options, 'client-secret');
  if (clientSecret) {
    oauth.clientSecret = clientSecret;
  }
  const storage = getString(options, 'storage');
  if (storage) {
    oauth.storage = parseStorageBackend(storage);
  }
  const scopes = getString(options, 'scopes');
  if (scopes) {
    oauth.scopes = parseScopes(scopes);
  }

  return { ...config, oauth };
}

function withOAuthFlags(config: CenConfig, options: Map<string, OptionValue>): CenConfig {
  const oauth = { ...config.oauth };
  const openBrowser = getBoolean(options, 'open-browser');
  if (openBrowser !== undefined) {
    oauth.openBrowser = openBrowser;
  }
  const loginHint = getString(options, 'login-hint');
  if (loginHint) {
    oauth.loginHint = loginHint;
  }
  return { ...config, oauth };
}

function withMonitorFlags(config: CenConfig, options: Map<string, OptionValue>): CenConfig {
  const camera = { ...config.camera };
  const motion = { ...config.motion };
  const notifications = { ...config.notifications };
  const summary = { ...config.summary };

  const deviceIndex = getNumber(options, 'device-index');
  if (deviceIndex !== undefined) {
    camera.deviceIndex = deviceIndex;
  }
  const sensitivity = getNumber(options, 'sensitivity');
  if (sensitivity !== undefined) {
    motion.sensitivity = sensitivity;
  }
  const minInterval = getNumber(options, 'min-interval-seconds');
  if (minInterval !== undefined) {
    notifications.minIntervalSeconds = minInterval;
  }
  const to = getString(options, 'to');
  if (to) {
    notifications.to = to;
  }
  const sender = getString(options, 'sender');
  if (sender) {
    notifications.from = sender;
  }
  const snapshot = getBoolean(options, 'snapshot');
  if (snapshot !== undefined) {
    notifications.snapshot = snapshot;
  }
  const subject = getString(options, 'subject');
  if (subject !== undefined) {
    notifications.subject = subject;
  }
  const body = getString(options, 'body');
  if (body !== undefined) {
    notifications.body = body;
  }
  const anomalyThreshold = getNumber(options, 'anomaly-threshold');
  if (anomalyThreshold !== undefined) {
    notifications.anomalyThreshold = anomalyThreshold;
  }
  const hourlySummary = getBoolean(options, 'hourly-summary');
  if (hourlySummary !== undefined) {
    summary.enabled = hourlySummary;
  }

  return { ...config, camera, motion, notifications, summary };
}

function parseOptions(args: string[], specs: readonly OptionSpec[]): ParsedOptions {
  const result: ParsedOptions = { values: new Map(), help: false, errors: [] };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }

    const equalsAt = token.indexOf('=');
    const flag = token.startsWith('--') && equalsAt > 0 ? token.slice(0, equalsAt) : token;
    const inlineValue = flag === token ? undefined : token.slice(equalsAt + 1);

    const negated = specs.find(spec => spec.negatable && flag === `--no-${spec.name}`);
    if (negated) {
      result.values.set(negated.name, false);
      continue;
    }

    const spec = specs.find(candidate => flag === `--${candidate.name}` || flag === candidate.alias);
    if (!spec) {
      result.errors.push(`Unknown option: ${token}`);
      continue;
    }

    if (spec.kind === 'boolean') {
      if (inlineValue !== undefined) {
        result.errors.push(`Option --${spec.name} does not take a value`);
      } else {
        result.values.set(spec.name, true);
      }
      continue;
    }

    let raw = inlineValue;
    if (raw === undefined) {
      const next = args[index + 1];
      if (next === undefined || next.startsWith('--')) {
        result.errors.push(`Missing value for --${spec.name}`);
        continue;
      }
      raw = next;
      index += 1;
    }

    if (spec.kind === 'number') {
      const parsed = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(parsed)) {
        result.errors.push(`Invalid number for --${spec.name}: ${raw}`);
        continue;
      }
      result.values.set(spec.name, parsed);
      continue;
    }

    result.values.set(spec.name, raw);
  }

  return result;
}

function getString(values: Map<string, OptionValue>, name: string): string | undefined {
  const value = values.get(name);
  return typeof value === 'string' ? value : undefined;
}

function getNumber(values: Map<string, OptionValue>, name: string): number | undefined {
  const value = values.get(name);
  return typeof value === 'number' ? value : undefined;
}

function getBoolean(values: Map<string, OptionValue>, name: string): boolean | undefined {
  const value = values.get(name);
  return typeof value === 'boolean' ? value : undefined;
}

function applyLogLevel(level: string) {
  const available = getAvailableLogLevels();
  if (!available.includes(level.trim().toLowerCase())) {
    throw new ConfigurationError(
      `Unknown log level "${level}" (available: ${available.join(', ')})`
    );
  }
  setLogLevel(level);
}

function reportError(error: unknown, io: CliIo): number {
  if (
    error instanceof ConfigurationError ||
    error instanceof AuthorizationError ||
    error instanceof MailSendError
  ) {
    io.stderr.write(`Error: ${error.message}\n`);
    return 1;
  }

  logger.error({ err: error }, 'CEN command failed');
  const message = error instanceof Error ? error.message : String(error);
  io.stderr.write(`Unexpected error: ${message}\n`);
  return 1;
}

function registerSignalHandlers(controller: AbortController): () => void {
  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal');
    controller.abort();
  };

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.once(signal, handleSignal);
  }

  return () => {
    for (const signal of signals) {
      process.off(signal, handleSignal);
    }
  };
}

function forwardAbort(source: AbortSignal, controller: AbortController): () => void {
  const onAbort = () => controller.abort();
  if (source.aborted) {
    controller.abort();
    return () => {};
  }
  source.addEventListener('abort', onAbort, { once: true });
  return () => {
    source.removeEventListener('abort', onAbort);
  };
}

const modulePath = fileURLToPath(import.meta.url);
const entryPath = path.resolve(process.argv[1] ?? '');

// npm links the bin through a symlink, so compare real paths.
if (fs.existsSync(entryPath) && fs.realpathSync(entryPath) === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'CEN CLI failed');
      process.exit(1);
    }
  );
}

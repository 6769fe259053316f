/**
 * dwh-cluster command line
 *
 * Parses the operation flags, loads the configuration and runs one
 * lifecycle operation.
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';

import { createAwsClients } from '../aws/index.js';
import { ClusterService, redshiftClusterApi } from '../cluster/index.js';
import { DEFAULT_CONFIG_PATH, loadConfig, type DwhConfig, type LoadConfigOptions } from '../config/index.js';
import { UsageError, WaitAbortedError, WaitTimeoutError, isDwhError } from '../errors/index.js';
import { RoleService, iamRoleApi } from '../iam/index.js';
import { ClusterLifecycleController, type LifecycleOperation } from '../lifecycle/index.js';
import { ConsoleLogger, type LogSink, type Logger } from '../logging/index.js';
import { MasterPasswordResolver, secretsApi } from '../secrets/index.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_TIMEOUT = 3;
export const EXIT_ABORTED = 130;

// ============================================================================
// Flag Validation
// ============================================================================

/**
 * Operation flags as parsed from the command line.
 */
export interface OperationFlags {
  create?: boolean;
  delete?: boolean;
  status?: boolean;
}

const OPERATIONS: readonly LifecycleOperation[] = ['create', 'delete', 'status'];

/**
 * Picks the single requested operation.
 *
 * @returns The operation, or undefined if no flag is set
 * @throws {UsageError} If more than one operation flag is set
 */
export function selectOperation(flags: OperationFlags): LifecycleOperation | undefined {
  const selected = OPERATIONS.filter((operation) => flags[operation] === true);
  const [first, ...others] = selected;
  if (first !== undefined && others.length > 0) {
    throw new UsageError(
      `Illegal usage: \`${first}\` is mutually exclusive with arguments \`${others.join(', ')}\`.`,
      { operations: selected }
    );
  }
  return first;
}

// ============================================================================
// Program
// ============================================================================

type ProgramOptions = {
  create?: boolean;
  delete?: boolean;
  status?: boolean;
  config: string;
  deleteRole?: boolean;
  wait: boolean;
  verbose?: boolean;
};

/**
 * Output streams of a CLI run.
 */
export interface CliOutput {
  /** Result lines */
  stdout(text: string): void;
  /** Usage messages and failures */
  stderr(text: string): void;
}

/**
 * Controller bound to one command run.
 */
export interface ControllerHandle {
  controller: ClusterLifecycleController;
  /** Releases SDK clients */
  dispose(): void;
}

/**
 * Injection points for {@link runCli}.
 */
export interface CliDependencies {
  loadConfig?: (options: LoadConfigOptions) => Promise<DwhConfig>;
  createController?: (config: DwhConfig, logger: Logger) => ControllerHandle;
  output?: CliOutput;
  /** Destination of progress log lines (default: console) */
  logSink?: LogSink;
  /** Aborts polling (the entry point wires SIGINT here) */
  signal?: AbortSignal;
}

const processOutput: CliOutput = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Builds the command definition.
 */
export function createProgram(output: CliOutput = processOutput): Command {
  return new Command()
    .name('dwh-cluster')
    .description('Create, delete or report the status of the Redshift cluster described by the configuration file.')
    .option('-c, --create', 'Create redshift cluster. Mutually exclusive with --delete and --status.')
    .option('-d, --delete', 'Delete redshift cluster. Mutually exclusive with --create and --status.')
    .option('-s, --status', 'Get status of redshift cluster. Mutually exclusive with --create and --delete.')
    .option('--config <path>', 'configuration file', DEFAULT_CONFIG_PATH)
    .option('--delete-role', 'with --delete, also delete the IAM role once the cluster is gone')
    .option('--no-wait', 'return right after the create or delete call instead of polling')
    .option('-v, --verbose', 'log debug output')
    .helpOption('-h, --help', 'display help')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.stdout(text),
      writeErr: (text) => output.stderr(text),
    });
}

/**
 * Creates a controller backed by the AWS SDK.
 */
export function createAwsController(config: DwhConfig, logger: Logger): ControllerHandle {
  const clients = createAwsClients(config.aws);
  const controller = new ClusterLifecycleController(config, {
    roles: new RoleService(iamRoleApi(clients.iam), logger),
    clusters: new ClusterService(redshiftClusterApi(clients.redshift), logger),
    passwords: new MasterPasswordResolver(config.cluster.masterPassword, secretsApi(clients.secretsManager), logger),
    logger,
  });
  return { controller, dispose: () => clients.destroy() };
}

/**
 * Runs the command line.
 *
 * @param argv - Arguments after the executable and script name
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  const output = dependencies.output ?? processOutput;
  const program = createProgram(output);

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, version or the parse error
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }

  const options = program.opts<ProgramOptions>();

  let operation: LifecycleOperation | undefined;
  try {
    operation = selectOperation(options);
    validateModifiers(operation, options);
  } catch (error) {
    if (error instanceof UsageError) {
      output.stderr(`error: ${error.message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (operation === undefined) {
    output.stderr(program.helpInformation());
    return EXIT_USAGE;
  }

  let config: DwhConfig;
  try {
    config = await (dependencies.loadConfig ?? loadConfig)({ path: options.config });
  } catch (error) {
    return reportFailure(error, output, options.verbose === true);
  }

  const logger = new ConsoleLogger(options.verbose ? 'debug' : config.observability.logLevel, dependencies.logSink);
  const handle = (dependencies.createController ?? createAwsController)(config, logger);

  try {
    const status = await runOperation(handle.controller, operation, options, dependencies.signal);
    output.stdout(`${status}\n`);
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, output, options.verbose === true);
  } finally {
    handle.dispose();
  }
}

function validateModifiers(operation: LifecycleOperation | undefined, options: ProgramOptions): void {
  if (options.deleteRole && operation !== 'delete') {
    throw new UsageError('Illegal usage: `delete-role` requires `delete`.');
  }
  if (options.deleteRole && !options.wait) {
    throw new UsageError('Illegal usage: `delete-role` cannot be combined with `no-wait`.');
  }
}

async function runOperation(
  controller: ClusterLifecycleController,
  operation: LifecycleOperation,
  options: ProgramOptions,
  signal?: AbortSignal
): Promise<string> {
  switch (operation) {
    case 'status':
      return controller.status();
    case 'create': {
      const outcome = await controller.create({ wait: options.wait, signal });
      return outcome.status;
    }
    case 'delete': {
      const outcome = await controller.delete({ wait: options.wait, signal, deleteRole: options.deleteRole });
      return outcome.status;
    }
  }
}

function reportFailure(error: unknown, output: CliOutput, verbose: boolean): number {
  if (error instanceof WaitTimeoutError) {
    output.stdout(`${error.lastStatus}\n`);
    output.stderr(`error: ${error.message}\n`);
    return EXIT_TIMEOUT;
  }
  if (error instanceof WaitAbortedError) {
    output.stderr(`error: ${error.message}\n`);
    return EXIT_ABORTED;
  }
  if (isDwhError(error)) {
    output.stderr(`error: ${verbose ? error.toDetailedString() : error.message}\n`);
    return EXIT_FAILURE;
  }
  const message = error instanceof Error ? (verbose && error.stack ? error.stack : error.message) : String(error);
  output.stderr(`error: ${message}\n`);
  return EXIT_FAILURE;
}

/**
 * Agent process launch and stdio transport
 *
 * An agent is any command that speaks line-delimited JSON-RPC on its stdio
 * once started with --acp. It is run either directly or inside the workspace
 * container through the exec wrapper.
 */

import { spawn as spawnProcess, type ChildProcess, type SpawnOptions } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

import {
  AGENT_ACP_FLAG,
  AGENT_CHANNEL_CAPACITY,
  AGENT_NOT_FOUND_EXIT_CODE,
  SPAWN_TIMEOUT,
} from '@/config/constants.js';
import type { SpawnMode } from '@/types/index.js';
import { Channel } from '@/utils/channel.js';
import { AgentSpawnError, errorMessage } from '@/utils/error-handler.js';
import { onLines, pipeLines } from '@/utils/line-reader.js';
import { createLogger } from '@/utils/logger.js';

const log = createLogger('spawner');

/**
 * How the agent process ended. `error` is set when it never started or the
 * process object itself failed.
 */
export interface AgentExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

/**
 * Line-oriented view of a running agent
 */
export interface AgentTransport {
  /** Lines for the agent's stdin (no trailing newline) */
  input: Channel<string>;
  /** Lines read from the agent's stdout; closes when stdout ends */
  output: Channel<string>;
  /** Settles once the process has exited or failed; never rejects */
  execution: Promise<AgentExit>;
  terminate(): void;
}

/**
 * What a spawner needs from the session it launches an agent for
 */
export interface TransportHost {
  readonly proxySessionId: string;
  readonly workspace: string;
  attachTransport(transport: AgentTransport): void;
}

export interface AgentSpawner {
  spawnAgent(session: TransportHost, agent: string, signal: AbortSignal): Promise<void>;
}

export interface AgentCommand {
  command: string;
  args: string[];
  env: Record<string, string>;
}

// Runs inside the container. $1 is the agent name, passed positionally so it
// is never interpolated into the script.
const WRAPPED_PREFLIGHT = [
  'command -v -- "$1" >/dev/null 2>&1 || {',
  ` printf "Agent '%s' not found in container\\n" "$1" >&2; exit ${AGENT_NOT_FOUND_EXIT_CODE};`,
  '};',
  `exec -- "$1" ${AGENT_ACP_FLAG}`,
].join(' ');

export function buildAgentCommand(
  mode: SpawnMode,
  agent: string,
  workspace: string,
  execBinary: string,
): AgentCommand {
  if (mode === 'direct') {
    return { command: agent, args: [AGENT_ACP_FLAG], env: {} };
  }

  return {
    command: execBinary,
    args: ['exec', '--workspace', workspace, '--quiet', '--', 'bash', '-c', WRAPPED_PREFLIGHT, '--', agent],
    // Keeps update notices from the wrapper off the agent's stdout
    env: { CAI_NO_UPDATE_CHECK: '1' },
  };
}

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface ProcessAgentSpawnerOptions {
  mode: SpawnMode;
  execBinary: string;
  spawnTimeoutMs?: number;
  channelCapacity?: number;
  /** Where agent stderr lines go */
  stderr?: Writable;
  spawnFn?: SpawnFunction;
}

/**
 * Write lines taken from `input` to stdin, honouring drain. Ends stdin once
 * `input` is closed.
 */
async function pipeStdin(input: Channel<string>, stdin: Writable): Promise<void> {
  let broken = false;
  stdin.on('error', (error) => {
    broken = true;
    // EPIPE: the agent went away; pending writes are dropped
    log.debug(`Agent stdin error: ${errorMessage(error)}`);
    input.close();
  });

  for await (const line of input) {
    if (broken || stdin.destroyed) {
      break;
    }
    if (!stdin.write(`${line}\n`, 'utf8')) {
      await new Promise<void>((resolve) => {
        const done = (): void => {
          stdin.off('drain', done);
          stdin.off('close', done);
          resolve();
        };
        stdin.once('drain', done);
        stdin.once('close', done);
      });
    }
  }

  if (!stdin.destroyed && !stdin.writableEnded) {
    stdin.end();
  }
}

function forwardStderr(stderr: Readable, sink: Writable): void {
  onLines(
    stderr,
    (line) => {
      try {
        sink.write(`${line}\n`);
      } catch (error) {
        log.debug(`Dropped agent stderr line: ${errorMessage(error)}`);
      }
    },
    () => undefined,
    (error) => {
      log.warn(`Agent stderr read failed: ${errorMessage(error)}`);
    },
  );
}

function isMissingBinary(error: Error): boolean {
  const code = 'code' in error ? error.code : undefined;
  return code === 'ENOENT' || code === 'EACCES';
}

export class ProcessAgentSpawner implements AgentSpawner {
  private readonly mode: SpawnMode;
  private readonly execBinary: string;
  private readonly spawnTimeoutMs: number;
  private readonly channelCapacity: number;
  private readonly stderr: Writable;
  private readonly spawnFn: SpawnFunction;

  constructor(options: ProcessAgentSpawnerOptions) {
    this.mode = options.mode;
    this.execBinary = options.execBinary;
    this.spawnTimeoutMs = options.spawnTimeoutMs ?? SPAWN_TIMEOUT;
    this.channelCapacity = options.channelCapacity ?? AGENT_CHANNEL_CAPACITY;
    this.stderr = options.stderr ?? process.stderr;
    this.spawnFn = options.spawnFn ?? spawnProcess;
  }

  /**
   * Start the agent and attach its transport to `session`.
   *
   * Resolves once the process has started. Throws AgentSpawnError when it
   * fails to start, does not start in time, or `signal` aborts first.
   */
  async spawnAgent(session: TransportHost, agent: string, signal: AbortSignal): Promise<void> {
    const { command, args, env } = buildAgentCommand(this.mode, agent, session.workspace, this.execBinary);
    log.debug(`[${session.proxySessionId}] spawning ${command} ${args.join(' ')}`);

    const child = this.spawnFn(command, args, {
      env: { ...process.env, ...env },
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout || !stderr) {
      child.kill();
      throw new AgentSpawnError(`Failed to start agent process: ${agent}`);
    }

    const input = new Channel<string>(this.channelCapacity);
    const output = new Channel<string>(this.channelCapacity);
    const endOutput = pipeLines(stdout, output, (error) => {
      log.warn(`[${session.proxySessionId}] agent stdout read failed: ${errorMessage(error)}`);
    });
    forwardStderr(stderr, this.stderr);

    const execution = new Promise<AgentExit>((resolve) => {
      child.once('close', (code, exitSignal) => {
        resolve({ code, signal: exitSignal });
      });
      child.on('error', (error) => {
        resolve({ code: null, signal: null, error });
      });
    });
    void execution.then((exit) => {
      input.close();
      endOutput();
      log.debug(
        `[${session.proxySessionId}] agent exited code=${String(exit.code)} signal=${String(exit.signal)}` +
          (exit.error ? ` error=${exit.error.message}` : ''),
      );
    });

    const terminate = (): void => {
      input.close();
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM');
      }
    };

    try {
      await this.waitForStart(child, agent, signal);
    } catch (error) {
      terminate();
      throw error;
    }

    session.attachTransport({ input, output, execution, terminate });
    pipeStdin(input, stdin).catch((error: unknown) => {
      log.debug(`[${session.proxySessionId}] stdin writer stopped: ${errorMessage(error)}`);
    });
  }

  private waitForStart(child: ChildProcess, agent: string, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        child.off('spawn', onSpawn);
        child.off('error', onError);
        signal.removeEventListener('abort', onAbort);
      };
      const onSpawn = (): void => {
        cleanup();
        resolve();
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(
          isMissingBinary(error)
            ? new AgentSpawnError(
                `Agent '${agent}' not found. Ensure the agent binary is installed and in PATH.`,
              )
            : new AgentSpawnError(`Failed to start agent '${agent}': ${error.message}`),
        );
      };
      const onAbort = (): void => {
        cleanup();
        reject(new AgentSpawnError(`Agent '${agent}' startup cancelled`));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new AgentSpawnError(`Agent '${agent}' did not start within ${this.spawnTimeoutMs} ms`));
      }, this.spawnTimeoutMs);

      if (signal.aborted) {
        onAbort();
        return;
      }
      child.once('spawn', onSpawn);
      child.once('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

import type { Readable, Writable } from 'node:stream';

import type { Command } from 'commander';

import { AcpProxy } from '@/services/acp-proxy/index.js';
import { ProcessAgentSpawner, type AgentSpawner } from '@/services/agent-spawner.js';
import { loadConfig } from '@/services/config-loader.js';
import { WorkspaceResolver } from '@/services/workspace-resolver.js';
import type { ProxyCommandOptions, ProxyConfig } from '@/types/index.js';
import { onTerminationSignal } from '@/utils/cli-helpers.js';
import { printError } from '@/utils/error-handler.js';
import { createLogger } from '@/utils/logger.js';
import { getConfigFilePath } from '@/utils/path-helper.js';

const log = createLogger('acp-proxy');

export interface ProxyRuntime {
  input: Readable;
  output: Writable;
  /** Builds the spawner from the effective config; replaced in tests */
  createSpawner?: (config: ProxyConfig) => AgentSpawner;
}

/**
 * Fold command-line options into the loaded config
 */
export function applyProxyOptions(config: ProxyConfig, agent: string | undefined, options: ProxyCommandOptions): ProxyConfig {
  return {
    ...config,
    agent: {
      name: agent ?? config.agent.name,
      mode: options.direct ? 'direct' : config.agent.mode,
      execBinary: options.execBin ?? config.agent.execBinary,
    },
    workspace: {
      ...config.workspace,
      containerRoot: options.containerWorkspace ?? config.workspace.containerRoot,
    },
  };
}

/**
 * Run the proxy on the given streams until the editor disconnects or a
 * termination signal arrives. Resolves with the exit code.
 */
export async function runProxy(
  agent: string | undefined,
  options: ProxyCommandOptions,
  runtime: ProxyRuntime,
): Promise<number> {
  const loaded = await loadConfig(getConfigFilePath(options.config));
  const config = applyProxyOptions(loaded, agent, options);

  const spawner =
    runtime.createSpawner?.(config) ??
    new ProcessAgentSpawner({
      mode: config.agent.mode,
      execBinary: config.agent.execBinary,
      spawnTimeoutMs: config.timeouts.spawnMs,
      channelCapacity: config.queues.agentChannelCapacity,
    });

  const proxy = new AcpProxy({
    agent: config.agent.name,
    spawner,
    output: runtime.output,
    workspaceResolver: new WorkspaceResolver({ markers: config.workspace.markers }),
    containerWorkspace: config.workspace.containerRoot,
    timeouts: config.timeouts,
    outputCapacity: config.queues.outputCapacity,
    server: config.server,
  });

  log.info(`Serving ${config.agent.name} (${config.agent.mode} mode)`);
  const removeHandlers = onTerminationSignal((signal) => {
    log.info(`Received ${signal}; shutting down`);
    proxy.cancel();
  });

  try {
    return await proxy.run(runtime.input);
  } finally {
    removeHandlers();
  }
}

/**
 * Register the default command: `acp-proxy [agent]`
 */
export function registerProxyCommand(program: Command): void {
  program
    .argument('[agent]', 'Agent command to run for each session (default from config)')
    .option('--direct', 'Run the agent binary directly instead of through the container wrapper')
    .option('--exec-bin <path>', 'Container exec wrapper binary')
    .option('--container-workspace <path>', 'Workspace root inside the container')
    .option('-c, --config <path>', 'Config file path')
    .action(async (agent: string | undefined, options: ProxyCommandOptions) => {
      try {
        process.exitCode = await runProxy(agent, options, {
          input: process.stdin,
          output: process.stdout,
        });
      } catch (error) {
        printError(error);
        process.exitCode = 1;
      } finally {
        // Nothing more will be read; let the event loop drain
        process.stdin.destroy();
      }
    });
}

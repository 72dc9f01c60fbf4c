import type { AgentExit, AgentSpawner, AgentTransport, TransportHost } from '../../src/services/agent-spawner.js';
import { createErrorResponse, createResultResponse, parseEnvelope, serializeEnvelope } from '../../src/services/wire-codec.js';
import type { JsonRpcEnvelope, JsonValue } from '../../src/types/json-rpc.js';
import { Channel } from '../../src/utils/channel.js';
import { AgentSpawnError } from '../../src/utils/error-handler.js';

export type AgentScript = (agent: FakeAgent, message: JsonRpcEnvelope) => void | Promise<void>;

/**
 * In-process stand-in for an agent process, wired to a session through
 * channels instead of stdio.
 */
export class FakeAgent {
  readonly received: JsonRpcEnvelope[] = [];
  readonly rawLines: string[] = [];
  readonly transport: AgentTransport;
  serving: Promise<void> | null = null;
  terminated = false;

  private exited = false;
  private resolveExit: (exit: AgentExit) => void = () => undefined;

  constructor(
    readonly host: TransportHost,
    readonly agentSessionId: string,
  ) {
    const execution = new Promise<AgentExit>((resolve) => {
      this.resolveExit = resolve;
    });
    this.transport = {
      input: new Channel<string>(64),
      output: new Channel<string>(64),
      execution,
      terminate: () => {
        this.terminated = true;
        this.exit(null, 'SIGTERM');
      },
    };
  }

  get hasExited(): boolean {
    return this.exited;
  }

  async send(envelope: JsonRpcEnvelope): Promise<void> {
    await this.transport.output.send(serializeEnvelope(envelope));
  }

  async sendLine(line: string): Promise<void> {
    await this.transport.output.send(line);
  }

  async reply(request: JsonRpcEnvelope, result: JsonValue): Promise<void> {
    if (request.id !== undefined) {
      await this.send(createResultResponse(request.id, result));
    }
  }

  async replyError(request: JsonRpcEnvelope, code: number, message: string): Promise<void> {
    if (request.id !== undefined) {
      await this.send(createErrorResponse(request.id, code, message));
    }
  }

  /** Buffered output still drains; nothing more is read or written */
  exit(code: number | null = 0, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.transport.output.close();
    this.transport.input.close();
    this.resolveExit({ code, signal });
  }

  lastReceived(method: string): JsonRpcEnvelope | undefined {
    return [...this.received].reverse().find((message) => message.method === method);
  }
}

/**
 * Answers the handshake and prompts; exits on session/end.
 */
export const respondingScript: AgentScript = async (agent, message) => {
  switch (message.method) {
    case 'initialize':
      await agent.reply(message, { protocolVersion: '2025-01-01', agentCapabilities: { loadSession: false } });
      return;
    case 'session/new':
      await agent.reply(message, { sessionId: agent.agentSessionId, modes: { currentModeId: 'default' } });
      return;
    case 'session/prompt':
      await agent.reply(message, { stopReason: 'end_turn' });
      return;
    case 'session/end':
      agent.exit(0);
      return;
    default:
      return;
  }
};

export class FakeAgentSpawner implements AgentSpawner {
  readonly agents: FakeAgent[] = [];
  readonly spawned: Array<{ agent: string; workspace: string; proxySessionId: string }> = [];
  /** When set, every spawn fails with this error */
  failure: Error | null = null;

  constructor(private readonly script: AgentScript = respondingScript) {}

  async spawnAgent(session: TransportHost, agent: string, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      throw new AgentSpawnError(`Agent '${agent}' startup cancelled`);
    }
    if (this.failure) {
      throw this.failure;
    }

    const fake = new FakeAgent(session, `agent-${this.agents.length + 1}`);
    this.agents.push(fake);
    this.spawned.push({ agent, workspace: session.workspace, proxySessionId: session.proxySessionId });
    session.attachTransport(fake.transport);
    fake.serving = this.serve(fake);
  }

  agent(index: number): FakeAgent {
    const fake = this.agents[index];
    if (!fake) {
      throw new Error(`No fake agent #${index}`);
    }
    return fake;
  }

  private async serve(fake: FakeAgent): Promise<void> {
    for await (const line of fake.transport.input) {
      fake.rawLines.push(line);
      const parsed = parseEnvelope(line);
      if (!parsed.ok) {
        continue;
      }
      fake.received.push(parsed.value);
      await this.script(fake, parsed.value);
    }
  }
}

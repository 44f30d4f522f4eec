import { describe, it, expect, vi } from 'vitest';
import { Orchestrator, isTerminationMessage } from '../orchestrator.js';
import { SpeakerSelector } from '../speaker-selector.js';
import type { Agent, AgentDescriptor, AgentReply, ConversationTracer, SpeakerDecision, ToolCallEvent } from '../types.js';
import { ToolGateway } from '../../gateway/tool-gateway.js';
import type { ToolTransport } from '../../gateway/http-transport.js';
import { ToolRegistry } from '../../tools/registry.js';
import { okResult, type ToolHandler } from '../../tools/types.js';
import { createCodeExecTool } from '../../tools/code-exec-tool.js';
import { SandboxExecutor } from '../../sandbox/sandbox-executor.js';
import type { SandboxLauncher } from '../../sandbox/launcher.js';
import { createLogger } from '../../../utils/logger.js';
import { OrchestrationError, ToolTransportError } from '../../../utils/errors.js';

const ENDPOINT = 'http://tools.test/mcp';
const COUNT_SQL = 'SELECT COUNT(*) AS count FROM customers';
const logger = createLogger({ level: 'silent', pretty: false });

const sqlSpecialist: AgentDescriptor = {
  name: 'sql_specialist',
  directive: 'Query the database.',
  tools: ['get_database_schema', 'execute_sql_query'],
};
const dataAnalyst: AgentDescriptor = { name: 'data_analyst', directive: 'Analyze results.', tools: ['calculator'] };

function scriptedAgent(descriptor: AgentDescriptor, replies: AgentReply[] = []) {
  const respond = vi.fn<Agent['respond']>(async () => ({ content: `${descriptor.name} has nothing to add`, toolCalls: [] }));
  for (const reply of replies) {
    respond.mockResolvedValueOnce(reply);
  }
  return { descriptor, respond } satisfies Agent;
}

// Returns tool results to the agent that asked; otherwise names `preferred`
function preferring(preferred: string | null): SpeakerDecision {
  return async history => {
    const last = history[history.length - 1];
    if (last?.role === 'tool') {
      const requester = [...history].reverse().find(message => message.role === 'agent');
      return requester ? { name: requester.speaker, repeat: true } : null;
    }
    return preferred;
  };
}

interface SetupOptions {
  agents: Agent[];
  decide?: SpeakerDecision;
  sqlHandler?: ToolHandler;
  remote?: boolean;
  useFallback?: boolean;
  maxRounds?: number;
  agentTimeoutMs?: number;
  tracer?: ConversationTracer;
}

function setup(options: SetupOptions) {
  const registry = new ToolRegistry();
  const sqlHandler = options.sqlHandler ?? vi.fn<ToolHandler>(async () => okResult('count\n-----\n200'));
  const calculator = vi.fn<ToolHandler>(async () => okResult('4'));

  registry.register({ name: 'get_database_schema', description: 'Schema', parameters: [], execute: async () => okResult('-- Table: customers') });
  registry.register({
    name: 'execute_sql_query',
    description: 'Run SQL',
    parameters: [{ name: 'sql', type: 'string', description: 'SQL', required: true }],
    execute: sqlHandler,
    endpoint: options.remote ? ENDPOINT : undefined,
  });
  registry.register({
    name: 'calculator',
    description: 'Math',
    parameters: [{ name: 'expression', type: 'string', description: 'Expression', required: true }],
    execute: calculator,
  });

  const transport = {
    send: vi.fn<ToolTransport['send']>(),
    checkHealth: vi.fn<ToolTransport['checkHealth']>(async () => true),
  };
  const gateway = new ToolGateway({ registry, logger, transport, timeoutMs: 1000, useFallback: options.useFallback });
  const orchestrator = new Orchestrator({
    agents: options.agents,
    gateway,
    selector: new SpeakerSelector({ decide: options.decide ?? preferring(null), logger }),
    logger,
    maxRounds: options.maxRounds,
    agentTimeoutMs: options.agentTimeoutMs,
    tracer: options.tracer,
  });

  return { orchestrator, transport, calculator };
}

const countQuery: AgentReply = {
  content: '',
  toolCalls: [{ name: 'execute_sql_query', arguments: { sql: COUNT_SQL } }],
};

describe('Orchestrator', () => {
  it('should answer a question through schema lookup and a query', async () => {
    const sql = scriptedAgent(sqlSpecialist, [
      { content: '', toolCalls: [{ name: 'get_database_schema', arguments: {} }] },
      countQuery,
      { content: 'There are 200 customers. TERMINATE', toolCalls: [] },
    ]);
    const analyst = scriptedAgent(dataAnalyst);
    const { orchestrator } = setup({ agents: [sql, analyst], decide: preferring('sql_specialist') });

    const result = await orchestrator.execute('How many customers do we have?');

    expect(result).toEqual({
      conversation: [
        { speaker: 'user', role: 'user', content: 'How many customers do we have?' },
        {
          speaker: 'get_database_schema',
          role: 'tool',
          content: '-- Table: customers',
          toolCall: { id: 1, name: 'get_database_schema', arguments: {} },
        },
        {
          speaker: 'execute_sql_query',
          role: 'tool',
          content: 'count\n-----\n200',
          toolCall: { id: 2, name: 'execute_sql_query', arguments: { sql: COUNT_SQL } },
        },
        { speaker: 'sql_specialist', role: 'agent', content: 'There are 200 customers. TERMINATE' },
      ],
      participants: ['sql_specialist'],
      output: 'There are 200 customers.',
      rounds: 3,
      terminationReason: 'terminate_signal',
    });
    expect(analyst.respond).not.toHaveBeenCalled();
    expect(sql.respond.mock.calls[2][0]).toHaveLength(5);
  });

  it('should show printed sandbox output to the agent', async () => {
    const code = "console.log('Average order: ' + (40 + 45) / 2);";
    const launcher = {
      launch: vi.fn<SandboxLauncher['launch']>(async () => ({
        ok: true,
        hasResult: false,
        result: '',
        printed: ['Average order: 42.5'],
      })),
    };
    const sandbox = new SandboxExecutor({
      allowedModules: [],
      timeoutMs: 1000,
      maxOutputLength: 1000,
      memoryMb: 64,
      permissionModel: false,
      logger,
      launcher,
    });
    const registry = new ToolRegistry();
    registry.register(createCodeExecTool(sandbox, []));
    const analyst = scriptedAgent({ name: 'data_analyst', directive: 'Analyze results.', tools: ['execute_code'] }, [
      { content: '', toolCalls: [{ name: 'execute_code', arguments: { code } }] },
      { content: 'The average order is 42.5. TERMINATE', toolCalls: [] },
    ]);
    const orchestrator = new Orchestrator({
      agents: [analyst],
      gateway: new ToolGateway({ registry, logger }),
      selector: new SpeakerSelector({ decide: preferring('data_analyst'), logger }),
      logger,
    });

    const result = await orchestrator.execute('What is the average order?');

    expect(result.conversation[1]).toEqual({
      speaker: 'execute_code',
      role: 'tool',
      content: 'Average order: 42.5',
      toolCall: { id: 1, name: 'execute_code', arguments: { code } },
    });
    expect(analyst.respond.mock.calls[1][0][2].content).toBe('Average order: 42.5');
    expect(result.output).toBe('The average order is 42.5.');
  });

  it('should fall back to the local tool when the remote endpoint is down', async () => {
    const events: ToolCallEvent[] = [];
    const sql = scriptedAgent(sqlSpecialist, [countQuery, { content: '200 customers. TERMINATE', toolCalls: [] }]);
    const { orchestrator, transport } = setup({
      agents: [sql],
      remote: true,
      sqlHandler: async () => okResult('200'),
      tracer: { onToolCall: event => void events.push(event) },
    });
    transport.send.mockRejectedValue(new ToolTransportError(ENDPOINT, 'connection refused'));

    const result = await orchestrator.execute('How many customers?');

    expect(result.conversation[1].content).toBe('200');
    expect(events[0].result.metadata?.source).toBe('fallback');
    expect(result.output).toBe('200 customers.');
  });

  it('should record a transport error when no fallback is allowed', async () => {
    const sql = scriptedAgent(sqlSpecialist, [countQuery, { content: 'The database is unavailable. TERMINATE', toolCalls: [] }]);
    const { orchestrator, transport } = setup({ agents: [sql], remote: true, useFallback: false });
    transport.send.mockRejectedValue(new ToolTransportError(ENDPOINT, 'connection refused'));

    const result = await orchestrator.execute('How many customers?');

    expect(result.conversation[1].content).toBe(
      'Error (TransportError): Tool endpoint unreachable at http://tools.test/mcp: connection refused',
    );
    expect(result.terminationReason).toBe('terminate_signal');
  });

  it('should stop after the round limit', async () => {
    const sql = scriptedAgent(sqlSpecialist);
    const analyst = scriptedAgent(dataAnalyst);
    const { orchestrator } = setup({ agents: [sql, analyst], maxRounds: 2 });

    const result = await orchestrator.execute('Keep talking');

    expect(result.rounds).toBe(2);
    expect(result.terminationReason).toBe('max_rounds');
    expect(result.conversation.map(entry => entry.speaker)).toEqual(['user', 'sql_specialist', 'data_analyst']);
    expect(result.output).toBe('data_analyst has nothing to add');
  });

  it('should end when no agent is eligible', async () => {
    const sql = scriptedAgent({ ...sqlSpecialist, maxConsecutiveTurns: 1 });
    const { orchestrator } = setup({ agents: [sql], maxRounds: 5 });

    const result = await orchestrator.execute('Q');

    expect(result.rounds).toBe(1);
    expect(result.terminationReason).toBe('no_eligible_speaker');
  });

  it('should end with a system message when an agent fails', async () => {
    const sql = scriptedAgent(sqlSpecialist);
    sql.respond.mockRejectedValueOnce(new Error('model offline'));
    const { orchestrator } = setup({ agents: [sql] });

    const result = await orchestrator.execute('Q');

    expect(result.conversation[1]).toEqual({
      speaker: 'system',
      role: 'system',
      content: 'Agent "sql_specialist" failed: model offline',
    });
    expect(result.terminationReason).toBe('error');
    expect(result.output).toBe('');
    expect(result.participants).toEqual([]);
  });

  it('should bound agent turns', async () => {
    const sql = scriptedAgent(sqlSpecialist);
    sql.respond.mockImplementationOnce(() => new Promise(() => undefined));
    const { orchestrator } = setup({ agents: [sql], agentTimeoutMs: 20 });

    const result = await orchestrator.execute('Q');

    expect(result.conversation[1].content).toBe('Agent "sql_specialist" failed: no response within 20ms');
    expect(result.terminationReason).toBe('error');
  });

  it('should end with a system message when speaker selection fails', async () => {
    const sql = scriptedAgent(sqlSpecialist);
    const { orchestrator } = setup({
      agents: [sql],
      decide: async () => {
        throw new Error('selector offline');
      },
    });

    const result = await orchestrator.execute('Q');

    expect(result.conversation[1].content).toBe('Speaker selection failed: selector offline');
    expect(result.rounds).toBe(0);
    expect(result.terminationReason).toBe('error');
    expect(sql.respond).not.toHaveBeenCalled();
  });

  it('should refuse tools the agent does not own', async () => {
    const sql = scriptedAgent(sqlSpecialist, [
      { content: '', toolCalls: [{ name: 'calculator', arguments: { expression: '2+2' } }] },
      { content: 'TERMINATE', toolCalls: [] },
    ]);
    const { orchestrator, calculator } = setup({ agents: [sql] });

    const result = await orchestrator.execute('Q');

    expect(result.conversation[1].content).toBe(
      'Error (ValidationError): Agent "sql_specialist" has no tool named "calculator"',
    );
    expect(calculator).not.toHaveBeenCalled();
  });

  it('should number tool calls across turns', async () => {
    const events: ToolCallEvent[] = [];
    const sql = scriptedAgent(sqlSpecialist, [
      {
        content: '',
        toolCalls: [
          { name: 'get_database_schema', arguments: {} },
          { name: 'execute_sql_query', arguments: { sql: COUNT_SQL } },
        ],
      },
      countQuery,
      { content: 'Done. TERMINATE', toolCalls: [] },
    ]);
    const { orchestrator } = setup({ agents: [sql], tracer: { onToolCall: event => void events.push(event) } });

    await orchestrator.execute('Q');

    expect(events.map(event => [event.round, event.call.id, event.call.name])).toEqual([
      [1, 1, 'get_database_schema'],
      [1, 2, 'execute_sql_query'],
      [2, 3, 'execute_sql_query'],
    ]);
  });

  it('should keep the last real answer when the final turn only terminates', async () => {
    const sql = scriptedAgent(sqlSpecialist, [{ content: 'Result is 42.', toolCalls: [] }]);
    const analyst = scriptedAgent(dataAnalyst, [{ content: 'TERMINATE', toolCalls: [] }]);
    const { orchestrator } = setup({ agents: [sql, analyst] });

    const result = await orchestrator.execute('Q');

    expect(result.output).toBe('Result is 42.');
    expect(result.participants).toEqual(['sql_specialist', 'data_analyst']);
  });

  it('should ignore tracer failures', async () => {
    const sql = scriptedAgent(sqlSpecialist, [{ content: 'Done. TERMINATE', toolCalls: [] }]);
    const { orchestrator } = setup({
      agents: [sql],
      tracer: {
        onTurn: () => {
          throw new Error('sink down');
        },
      },
    });

    const result = await orchestrator.execute('Q');

    expect(result.terminationReason).toBe('terminate_signal');
    expect(result.output).toBe('Done.');
  });

  it('should stop when cancelled', async () => {
    const sql = scriptedAgent(sqlSpecialist);
    const { orchestrator } = setup({ agents: [sql] });
    const controller = new AbortController();
    controller.abort();

    const result = await orchestrator.execute('Q', { signal: controller.signal });

    expect(result.terminationReason).toBe('cancelled');
    expect(result.rounds).toBe(0);
    expect(sql.respond).not.toHaveBeenCalled();
  });

  it('should keep conversations independent', async () => {
    const sql = scriptedAgent(sqlSpecialist, [
      { content: 'First. TERMINATE', toolCalls: [] },
      { content: 'Second. TERMINATE', toolCalls: [] },
    ]);
    const { orchestrator } = setup({ agents: [sql] });

    const first = await orchestrator.execute('One');
    const second = await orchestrator.execute('Two');

    expect(first.conversation.map(entry => entry.content)).toEqual(['One', 'First. TERMINATE']);
    expect(second.conversation.map(entry => entry.content)).toEqual(['Two', 'Second. TERMINATE']);
  });

  it('should reject invalid agent sets', () => {
    const { orchestrator } = setup({ agents: [scriptedAgent(sqlSpecialist)] });

    expect(orchestrator.agentNames).toEqual(['sql_specialist']);
    expect(() => setup({ agents: [] })).toThrow(OrchestrationError);
    expect(() => setup({ agents: [scriptedAgent(sqlSpecialist), scriptedAgent(sqlSpecialist)] })).toThrow(
      'Duplicate agent name "sql_specialist"',
    );
  });
});

describe('isTerminationMessage', () => {
  it('should detect a trailing marker', () => {
    expect(isTerminationMessage('All done. TERMINATE\n')).toBe(true);
    expect(isTerminationMessage('TERMINATE the process first')).toBe(false);
  });
});

import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ConfigOverrides } from '../src/config.js';
import type { AssessmentService, AssessmentServiceOptions } from '../src/service.js';
import { registerTools } from '../src/tools/index.js';
import { DASHBOARD_REQUEST, HOSPITAL, intake, risk, testService } from './helpers.js';

const STATUS_MARKER = '\n\n**Status**: ';
const NEGOTIATION = 'NEG-RISK-pii_exposure-person';

interface ToolReply {
  data: Record<string, unknown>;
  /** "<status>: <message>" */
  status: string;
}

const open: Array<() => Promise<void>> = [];

afterEach(async () => {
  await Promise.all(open.splice(0).map((close) => close()));
});

async function connect(
  options: Omit<AssessmentServiceOptions, 'config'> = {}, config: ConfigOverrides = {},
): Promise<{ client: Client; service: AssessmentService }> {
  const { service } = testService(options, config);
  const server = new McpServer({ name: 'assessment-pipeline', version: '0.1.0' });
  registerTools(server, service);

  const client = new Client({ name: 'tools-test', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  open.push(async () => {
    await client.close();
    await server.close();
  });
  return { client, service };
}

async function call(client: Client, name: string, args: Record<string, unknown>): Promise<ToolReply> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (!first || first.type !== 'text') throw new Error(`${name} returned no text content`);

  const at = first.text.indexOf(STATUS_MARKER);
  if (at < 0) throw new Error(`${name} returned no status line`);
  return {
    data: z.record(z.unknown()).parse(JSON.parse(first.text.slice(0, at))),
    status: first.text.slice(at + STATUS_MARKER.length).split('\n')[0],
  };
}

function manualClock(start = '2025-03-01T10:00:00.000Z') {
  let now = Date.parse(start);
  return {
    clock: () => new Date(now),
    advance: (ms: number) => { now += ms; },
  };
}

describe('MCP tools', () => {
  // ================================================================
  // SUCCESS ENVELOPE
  // ================================================================

  it('runs the pipeline and hands control back to the user', async () => {
    const { client } = await connect();
    const reply = await call(client, 'assessment_start', {
      client_context: HOSPITAL, transcript: DASHBOARD_REQUEST, contract_value: 30000, assessment_id: 'AS-tool',
    });

    expect(reply.status).toMatch(/^success: Run RUN-[0-9a-f]{8} completed; report status APPROVED\.$/);
    expect(reply.data.assessment_id).toBe('AS-tool');
    expect(reply.data.status).toBe('completed');
    expect(reply.data.next_action).toEqual({
      control: 'user',
      description: 'Review the compiled outline before handing it to the renderer.',
      bootstrap_prompt: 'Use assessment_view with assessment_id="AS-tool" and present the synthesis findings.',
    });
  });

  // ================================================================
  // ERROR ENVELOPE
  // ================================================================

  it('maps a pipeline error to an error output carrying its code', async () => {
    const { client } = await connect();
    const reply = await call(client, 'assessment_view', { assessment_id: 'AS-missing' });

    expect(reply.status).toBe('error: Assessment AS-missing not found');
    expect(reply.data.code).toBe('CASE_NOT_FOUND');
    expect(reply.data.details).toEqual({ assessment_id: 'AS-missing' });
    expect(reply.data.next_action).toEqual({
      control: 'user',
      description: 'The request was rejected; nothing was recorded.',
      bootstrap_prompt: 'Fix the input (CASE_NOT_FOUND) and retry, or use assessment_view to inspect the case.',
    });
  });

  it('rejects turn 2 without a proposal', async () => {
    const { client } = await connect();
    const reply = await call(client, 'negotiation_submit_turn', {
      assessment_id: 'AS-any', negotiation_id: NEGOTIATION, turn: 2, role: 'technical_pm',
    });

    expect(reply.status).toBe('error: Turn 2 requires a proposal');
    expect(reply.data.code).toBe('INVALID_INPUT');
    expect(reply.data.details).toEqual({ negotiation_id: NEGOTIATION });
  });

  it('rejects an out-of-order turn with SEQUENCE_VIOLATION', async () => {
    const { client, service } = await connect();
    const record = service.cases.create(intake(), 'AS-order');
    service.orchestrator.coordinatorFor(record).initiate(risk());

    const reply = await call(client, 'negotiation_submit_turn', {
      assessment_id: 'AS-order', negotiation_id: NEGOTIATION, turn: 3, role: 'legal_counsel',
    });
    expect(reply.status).toBe(`error: Negotiation ${NEGOTIATION} expects turn 2, got turn 3`);
    expect(reply.data.code).toBe('SEQUENCE_VIOLATION');
    expect(record.length).toBe(2);
  });

  it('reports a turn that arrived after its budget as not accepted', async () => {
    const time = manualClock();
    const { client, service } = await connect({ clock: time.clock }, { negotiation: { turn_timeout_ms: 1000 } });
    const record = service.cases.create(intake(), 'AS-late');
    service.orchestrator.coordinatorFor(record).initiate(risk());
    time.advance(1000);

    const reply = await call(client, 'negotiation_submit_turn', {
      assessment_id: 'AS-late', negotiation_id: NEGOTIATION, turn: 2, role: 'technical_pm',
      proposal: { mitigation: 'filtered_sql_view', exclusion_scope: ['date_of_birth'], rationale: 'view without dob' },
    });

    expect(reply.status).toBe('error: Turn 2 arrived after the budget; negotiation timed out.');
    expect(reply.data.accepted).toBe(false);
    expect(reply.data.status).toBe('TIMEOUT');
    expect(record.snapshot().map((e) => e.kind)).toEqual(['CaseOpened', 'NegotiationTurn', 'NegotiationDeadlocked']);
  });

  // ================================================================
  // CALCULATOR
  // ================================================================

  it('prices margin_calculate with the configured finance rates', async () => {
    const { client } = await connect({}, { finance: { hourly_rate: 200 } });
    const reply = await call(client, 'margin_calculate', { hours: 100, contract_value: 100000, tier: 'standard' });

    expect(reply.data.hourly_rate).toBe(200);
    expect(reply.data.pm_overhead_pct).toBe(0.15);
    expect(reply.data.implementation_cost).toBeCloseTo(23000, 6);
    expect(reply.data.margin).toBeCloseTo(0.77, 9);
    expect(reply.data.outcome).toBe('approved');
  });

  it('lets margin_calculate arguments override the configured rates', async () => {
    const { client } = await connect({}, { finance: { hourly_rate: 200 } });
    const reply = await call(client, 'margin_calculate', {
      hours: 100, contract_value: 100000, tier: 'standard', hourly_rate: 100, pm_overhead_pct: 0,
    });

    expect(reply.data.implementation_cost).toBe(10000);
    expect(reply.data.margin).toBe(0.9);
  });
});

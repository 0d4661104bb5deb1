import { describe, it, expect } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getConfig, mergeConfig } from '../src/config.js';
import { formatNotice } from '../src/escalation/index.js';
import { createServer } from '../src/server.js';
import { MemoryCaseStorage } from '../src/storage/index.js';
import { MemoryEscalationChannel } from '../src/escalation/index.js';

describe('Config', () => {
  it('defaults match the documented values', () => {
    const config = getConfig();
    expect(config.pipeline.confidence_floor).toBe(0.6);
    expect(config.pipeline.required_roles).toEqual(['outcomes_strategist', 'technical_pm', 'legal_counsel', 'document_architect']);
    expect(config.negotiation.turn_timeout_ms).toBe(30_000);
    expect(config.finance).toEqual({ hourly_rate: 175, pm_overhead_pct: 0.15, manual_baseline_hours: 4 });
  });

  it('uses the test data directory', () => {
    expect(getConfig().storage.base_path).toBe(process.env.ASSESSMENT_DATA_PATH);
  });

  it('merges partial overrides section by section', () => {
    const merged = mergeConfig(getConfig(), { finance: { hourly_rate: 200 }, negotiation: { turn_timeout_ms: 500 } });
    expect(merged.finance).toEqual({ hourly_rate: 200, pm_overhead_pct: 0.15, manual_baseline_hours: 4 });
    expect(merged.negotiation.turn_timeout_ms).toBe(500);
    expect(merged.pipeline).toEqual(getConfig().pipeline);
  });
});

describe('Escalation notice', () => {
  it('names the case, the run and every blocker', () => {
    const text = formatNotice({
      target_id: 'FD-RUN-1',
      raised_at: '2025-03-01T10:00:00.000Z',
      context: {
        assessment_id: 'AS-1', run_id: 'RUN-1', step: 'C', reason: 'Final compilation gate is blocked',
        blockers: [{ kind: 'financial_gate', target_id: 'FD-RUN-1', message: 'margin too thin' }],
      },
    });
    expect(text.split('\n')).toContain('Run:        RUN-1 (halted at step C)');
    expect(text.split('\n')).toContain('  - [financial_gate] FD-RUN-1: margin too thin');
  });
});

describe('Server', () => {
  it('builds an MCP server over the assessment service', () => {
    const server = createServer({ storage: new MemoryCaseStorage(), escalation: new MemoryEscalationChannel() });
    expect(server).toBeInstanceOf(McpServer);
  });
});

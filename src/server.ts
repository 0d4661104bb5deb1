/**
 * Assessment Pipeline Server: MCP SDK over the assessment service.
 * All state lives in data/ as append-only case logs plus the audit trail.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTools } from './tools/index.js';
import { registerResources } from './resources/index.js';
import { registerPrompts } from './prompts/index.js';
import { loadConfig } from './config.js';
import { AssessmentService } from './service.js';
import type { AssessmentServiceOptions } from './service.js';

const SERVER_INSTRUCTIONS = `Assessment Pipeline turns a client discovery transcript into a reviewed assessment report. Five specialist roles review each case; every step is recorded in an append-only, hash-chained case log.

## How to use

- **assessment_start**: Open a case and run the pipeline. Primary entry point.
- **assessment_resume**: Continue a run after blockers are cleared.
- **assessment_view**: Report status, artifacts, negotiations, financial decision and blockers.

## Pipeline steps

1. **A. Targeting**: Industry, KPIs and requested solutions from the transcript
2. **B. Feasibility + Compliance**: In parallel. Compliance raises blocking data risks; each is negotiated (at most three turns) with Feasibility
3. **C. Economics gate**: Margin against the tier target. Final compilation is blocked until every negotiation is resolved and the margin is approved
4. **D. Synthesis**: Compiles the approved findings into the report outline

## Human intervention

A DEADLOCK or TIMEOUT negotiation, a financial outcome other than approved, or a low-confidence stage halts the run and raises an escalation. Only a person clears these:
- **negotiation_resolve**: Record the reviewer's decision on a negotiation
- **financial_reevaluate**: Append a new financial decision with revised inputs

## Critical rules

- When control="user", STOP and present the decision to the user
- When control="agent", proceed with the bootstrap prompt immediately
- Never call negotiation_resolve without an explicit decision from a person`;

export function createServer(options: AssessmentServiceOptions = {}): McpServer {
  const service = new AssessmentService({ config: loadConfig(), ...options });

  const server = new McpServer(
    {
      name: 'assessment-pipeline',
      version: '0.1.0',
    },
    {
      capabilities: { tools: {}, resources: {}, prompts: {}, logging: {} },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  registerTools(server, service);
  registerResources(server, service);
  registerPrompts(server, service);

  return server;
}

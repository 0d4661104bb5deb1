/**
 * MCP Prompt registrations: structured workflows.
 * Each prompt is a self-contained procedure the agent follows step-by-step.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AssessmentService } from '../service.js';

export function registerPrompts(server: McpServer, service: AssessmentService): void {

  server.prompt('run-assessment', 'Open a case from a discovery transcript and drive it to a report.', { client_context: z.string() }, async (args) => ({
    messages: [{ role: 'user' as const, content: { type: 'text' as const, text: `# Assessment Pipeline

Client: ${args.client_context}

**Step 1**: Collect the transcript, the client budget (if any) and the fields the client insists on.

**Step 2**: Start the pipeline:
\`\`\`prompt
Use assessment_start with client_context, transcript, contract_value and required_fields
\`\`\`

**Step 3**: If the run stalls, present every blocker to the user. Do not resolve negotiations or change budgets on their behalf.

**Step 4**: Once blockers are cleared, use \`assessment_resume\` and report the final status.

Follow the bootstrap prompts from each tool: they chain automatically.` } }],
  }));

  server.prompt('review-intervention', 'Walk a reviewer through what is holding a case.', { assessment_id: z.string() }, async (args) => {
    const view = service.getCaseView(args.assessment_id);
    const blockers = view.blockers.length > 0
      ? view.blockers.map((b, i) => `${i + 1}. [${b.kind}] ${b.target_id}: ${b.message}`).join('\n')
      : 'No blockers. The report is approved.';
    return {
      messages: [{ role: 'user' as const, content: { type: 'text' as const, text: `# Intervention Review: ${args.assessment_id}

Report status: **${view.status}** (run ${view.run_id ?? 'none'})

## Blockers
${blockers}

## Procedure
1. For each negotiation blocker, use \`negotiation_status\` and show the reviewer the risk and the last proposal.
2. Record the reviewer's call with \`negotiation_resolve\`. REJECTED keeps the case pending.
3. For a financial blocker, agree a revised budget, hours or tier and use \`financial_reevaluate\`.
4. Use \`assessment_resume\` and report the new status.` } }],
    };
  });
}

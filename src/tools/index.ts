/**
 * MCP Tool registrations.
 *
 * TOOL HIERARCHY:
 *   1. PIPELINE TOOLS (assessment_start, assessment_resume, assessment_view, assessment_archive)
 *      → Drive a case through steps A-D and read its report status.
 *   2. INTERVENTION TOOLS (negotiation_status, negotiation_submit_turn, negotiation_resolve, financial_reevaluate)
 *      → Where a human or an external reviewer takes part.
 *   3. CALCULATORS (margin_calculate)
 *      → Pure Decision Engine calls; nothing is recorded.
 *
 * Every tool returns the next step and who owns it: agent (continue) or user (decide).
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { classifyMarginGap, computeMargin, marginGap, targetMarginFor } from '../decision/index.js';
import { InvalidInputError, isPipelineError } from '../errors.js';
import type { TurnResult } from '../negotiation/index.js';
import type { PipelineOutcome } from '../pipeline/index.js';
import type { AssessmentService } from '../service.js';
import {
  dataCharacteristicsSchema, mitigationProposalSchema, reviewRoleSchema, tierSchema,
} from '../types/schemas.js';
import type { ToolOutput } from '../types/index.js';

function output(o: ToolOutput) {
  const dataWithAction: Record<string, unknown> = { ...o.data };
  if (o.next) {
    dataWithAction.next_action = {
      control: o.next.control,
      description: o.next.description,
      bootstrap_prompt: o.next.bootstrap_prompt,
    };
  }

  const parts: string[] = [];
  parts.push(JSON.stringify(dataWithAction, null, 2));
  parts.push('');
  parts.push(`**Status**: ${o.status}: ${o.message}`);
  if (o.next) {
    parts.push(`**Control returns to**: ${o.next.control}`);
    parts.push(`**Next step**: ${o.next.description}`);
  }
  return { content: [{ type: 'text' as const, text: parts.join('\n') }] };
}

/** Pipeline errors become error outputs carrying their code; anything else is a server fault. */
async function guarded(fn: () => ToolOutput | Promise<ToolOutput>) {
  try {
    return output(await fn());
  } catch (err) {
    if (!isPipelineError(err)) throw err;
    return output({
      status: 'error',
      data: { code: err.code, details: err.details },
      message: err.message,
      next: {
        control: 'user',
        description: 'The request was rejected; nothing was recorded.',
        bootstrap_prompt: `Fix the input (${err.code}) and retry, or use assessment_view to inspect the case.`,
      },
    });
  }
}

function outcomeOutput(outcome: PipelineOutcome): ToolOutput {
  const id = outcome.assessment_id;
  const data = { ...outcome } satisfies Record<string, unknown>;
  switch (outcome.status) {
    case 'completed':
      return {
        status: 'success', data,
        message: `Run ${outcome.run_id} completed; report status ${outcome.report_status}.`,
        next: {
          control: 'user',
          description: 'Review the compiled outline before handing it to the renderer.',
          bootstrap_prompt: `Use assessment_view with assessment_id="${id}" and present the synthesis findings.`,
        },
      };
    case 'stalled':
      return {
        status: 'needs_approval', data,
        message: `Run ${outcome.run_id} halted at step ${outcome.step}: ${outcome.blockers.map((b) => b.target_id).join(', ')}.`,
        next: {
          control: 'user',
          description: 'HUMAN INTERVENTION REQUIRED. Resolve each blocker, then resume.',
          bootstrap_prompt: outcome.blockers.map((b) => {
            if (b.kind === 'negotiation_unresolved') {
              return `Use negotiation_resolve with assessment_id="${id}" negotiation_id="${b.target_id}" once a reviewer has decided.`;
            }
            if (b.kind === 'financial_gate') {
              return `Use financial_reevaluate with assessment_id="${id}" after agreeing a revised budget or scope (${b.target_id}).`;
            }
            return `Address ${b.target_id}: ${b.message}`;
          }).concat(`Then use assessment_resume with assessment_id="${id}" run_id="${outcome.run_id}".`).join('\n'),
        },
      };
    case 'aborted':
      return {
        status: 'success', data,
        message: `Run ${outcome.run_id} aborted at step ${outcome.step}.`,
        next: {
          control: 'user',
          description: 'The run was cancelled; completed stages are kept.',
          bootstrap_prompt: `Use assessment_resume with assessment_id="${id}" run_id="${outcome.run_id}" to continue.`,
        },
      };
    case 'failed':
      return {
        status: 'error', data,
        message: `Run ${outcome.run_id} failed at step ${outcome.step}: ${outcome.error?.message ?? 'unknown error'}.`,
        next: {
          control: 'user',
          description: 'A stage failed. Inspect the case and the audit trail.',
          bootstrap_prompt: `Read assessment://audit and use assessment_view with assessment_id="${id}".`,
        },
      };
  }
}

const intakeShape = {
  client_context: z.string().describe('Who the client is and what they do'),
  transcript: z.string().describe('Discovery call transcript text'),
  contract_value: z.number().positive().nullable().optional().describe('Client budget (TCV). Omit to price at the recommended value.'),
  required_fields: z.array(z.string()).optional().describe('Data fields the client insists on receiving, by field id'),
  data_characteristics: dataCharacteristicsSchema.partial().optional().describe('Facts about the data that drive mitigation selection'),
};

export function registerTools(server: McpServer, service: AssessmentService): void {

  // =========================================================================
  // PIPELINE
  // =========================================================================

  server.tool(
    'assessment_start',
    'Open a new assessment case from a discovery transcript and run the review pipeline: targeting, feasibility and compliance in parallel, negotiations over blocking risks, the margin gate, then synthesis.',
    { ...intakeShape, assessment_id: z.string().optional().describe('Explicit id; generated when omitted') },
    async (args) => guarded(async () => {
      const outcome = await service.startAssessment({
        client_context: args.client_context,
        transcript: args.transcript,
        contract_value: args.contract_value ?? null,
        required_fields: args.required_fields ?? [],
        data_characteristics: {
          pii_required_by_client: args.data_characteristics?.pii_required_by_client ?? false,
          pii_colocated_with_business_data: args.data_characteristics?.pii_colocated_with_business_data ?? false,
          structure_only: args.data_characteristics?.structure_only ?? false,
          dev_test_context: args.data_characteristics?.dev_test_context ?? false,
        },
      }, { assessmentId: args.assessment_id });
      return outcomeOutput(outcome);
    }),
  );

  server.tool(
    'assessment_resume',
    'Continue a stalled or aborted run after blockers are resolved. Stages already recorded for the run are skipped.',
    {
      assessment_id: z.string(),
      run_id: z.string().optional().describe('Run to continue (default: the latest)'),
    },
    async (args) => guarded(async () => outcomeOutput(await service.resumeAssessment(args.assessment_id, args.run_id))),
  );

  server.tool(
    'assessment_view',
    'Current case view: report status, artifacts of the latest run, negotiations, financial decision and every blocker by id.',
    { assessment_id: z.string() },
    async (args) => guarded(() => {
      const view = service.getCaseView(args.assessment_id);
      return {
        status: 'success',
        data: { ...view },
        message: view.status === 'APPROVED'
          ? 'Report approved.'
          : `Report status ${view.status}; ${view.blockers.length} blocker(s).`,
        next: view.status === 'APPROVED' ? null : {
          control: 'user',
          description: 'Intervention required before the report can be approved.',
          bootstrap_prompt: view.blockers.map((b) => `- [${b.kind}] ${b.target_id}: ${b.message}`).join('\n'),
        },
      };
    }),
  );

  server.tool(
    'assessment_archive',
    'Archive a case. Archived cases keep their log but accept no further events.',
    { assessment_id: z.string(), reason: z.string() },
    async (args) => guarded(() => {
      const view = service.archiveCase(args.assessment_id, args.reason);
      return { status: 'success', data: { ...view }, message: `Assessment ${args.assessment_id} archived.`, next: null };
    }),
  );

  // =========================================================================
  // INTERVENTION
  // =========================================================================

  server.tool(
    'negotiation_status',
    'State of one negotiation. An open negotiation past its turn budget is timed out by this read.',
    { assessment_id: z.string(), negotiation_id: z.string() },
    async (args) => guarded(() => {
      const state = service.negotiationStatus(args.assessment_id, args.negotiation_id);
      return {
        status: 'success',
        data: { ...state },
        message: `Negotiation ${state.negotiation_id} is ${state.status} at turn ${state.turn}.`,
        next: state.status === 'DEADLOCK' || state.status === 'TIMEOUT' ? {
          control: 'user',
          description: 'Human resolution required.',
          bootstrap_prompt: `Use negotiation_resolve with assessment_id="${args.assessment_id}" negotiation_id="${state.negotiation_id}".`,
        } : null,
      };
    }),
  );

  server.tool(
    'negotiation_submit_turn',
    'Submit turn 2 (responder proposal) or turn 3 (initiator review) of a negotiation. Out-of-order turns are rejected.',
    {
      assessment_id: z.string(),
      negotiation_id: z.string(),
      turn: z.union([z.literal(2), z.literal(3)]),
      role: reviewRoleSchema,
      proposal: mitigationProposalSchema.optional().describe('Required for turn 2'),
    },
    async (args) => guarded(async () => {
      let result: TurnResult;
      if (args.turn === 2) {
        if (!args.proposal) throw new InvalidInputError('Turn 2 requires a proposal', { negotiation_id: args.negotiation_id });
        result = await service.submitTurn(args.assessment_id, args.negotiation_id, { turn: 2, role: args.role, proposal: args.proposal });
      } else {
        result = await service.submitTurn(args.assessment_id, args.negotiation_id, { turn: 3, role: args.role });
      }
      return {
        status: result.accepted ? 'success' : 'error',
        data: { ...result },
        message: result.accepted
          ? `Turn ${args.turn} recorded; negotiation is ${result.status}.`
          : `Turn ${args.turn} arrived after the budget; negotiation timed out.`,
        next: null,
      };
    }),
  );

  server.tool(
    'negotiation_resolve',
    'Record a human decision on a DEADLOCK or TIMEOUT negotiation. RESOLVED clears it for the gate; REJECTED keeps the case pending intervention.',
    {
      assessment_id: z.string(),
      negotiation_id: z.string(),
      final_outcome: z.string().describe('What was agreed, e.g. "client accepts tokenized SSN"'),
      resolved_by: z.string(),
      status: z.enum(['RESOLVED', 'REJECTED']).optional(),
      notes: z.string().optional(),
    },
    async (args) => guarded(() => {
      const state = service.resolveNegotiation(args.assessment_id, {
        negotiation_id: args.negotiation_id,
        status: args.status ?? 'RESOLVED',
        final_outcome: args.final_outcome,
        resolved_by: args.resolved_by,
        notes: args.notes ?? '',
      });
      return {
        status: 'success',
        data: { ...state },
        message: `Human resolution recorded for ${state.negotiation_id}.`,
        next: {
          control: 'agent',
          description: 'Resume the pipeline.',
          bootstrap_prompt: `Use assessment_resume with assessment_id="${args.assessment_id}".`,
        },
      };
    }),
  );

  server.tool(
    'financial_reevaluate',
    'Append a new financial decision for the latest run with revised inputs. Prior decisions are kept; the gate uses the latest.',
    {
      assessment_id: z.string(),
      contract_value: z.number().positive().nullable().optional().describe('Revised budget; null prices at the recommended value'),
      tier: tierSchema.optional(),
      hours: z.number().nonnegative().optional(),
      hourly_rate: z.number().nonnegative().optional(),
      pm_overhead_pct: z.number().nonnegative().optional(),
    },
    async (args) => guarded(() => {
      const { assessment_id: assessmentId, ...overrides } = args;
      const { decision, report_status: reportStatus } = service.reevaluateFinancials(assessmentId, overrides);
      return {
        status: decision.outcome === 'approved' ? 'success' : 'needs_approval',
        data: { decision, report_status: reportStatus },
        message: `Financial decision ${decision.decision_id}: ${decision.outcome}.`,
        next: decision.outcome === 'approved' ? {
          control: 'agent',
          description: 'The margin gate is satisfied.',
          bootstrap_prompt: `Use assessment_resume with assessment_id="${assessmentId}".`,
        } : null,
      };
    }),
  );

  // =========================================================================
  // CALCULATORS
  // =========================================================================

  server.tool(
    'margin_calculate',
    'Compute implementation cost, margin and gate outcome for an estimate without touching any case.',
    {
      hours: z.number().nonnegative(),
      contract_value: z.number().positive(),
      tier: tierSchema,
      hourly_rate: z.number().nonnegative().optional().describe('Defaults to the configured finance.hourly_rate'),
      pm_overhead_pct: z.number().nonnegative().optional().describe('Defaults to the configured finance.pm_overhead_pct'),
    },
    async (args) => guarded(() => {
      const rate = args.hourly_rate ?? service.finance.hourly_rate;
      const overhead = args.pm_overhead_pct ?? service.finance.pm_overhead_pct;
      const { implementationCost, margin } = computeMargin(args.hours, rate, overhead, args.contract_value);
      const target = targetMarginFor(args.tier);
      const outcome = classifyMarginGap(margin, target);
      return {
        status: 'success',
        data: {
          implementation_cost: implementationCost, hourly_rate: rate, pm_overhead_pct: overhead,
          margin, target_margin: target, gap: marginGap(margin, target), outcome,
        },
        message: `Margin ${(margin * 100).toFixed(1)}% against target ${(target * 100).toFixed(1)}%: ${outcome}.`,
        next: null,
      };
    }),
  );
}

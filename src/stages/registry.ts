/**
 * Stage Registry: which runner reviews for which role, and where each role
 * sits in the pipeline.
 *
 * finance_director has no runner: its FinancialDecision comes from the
 * Decision Engine, appended by the orchestrator.
 */

import { InvalidInputError } from '../errors.js';
import { ROLE_DISPLAY } from '../types/index.js';
import type { PipelineStep, ReviewRole } from '../types/index.js';
import { complianceRunner } from './compliance.js';
import { feasibilityRunner } from './feasibility.js';
import { synthesisRunner } from './synthesis.js';
import { targetingRunner } from './targeting.js';
import type { StageRunner } from './types.js';

export interface StageProfile {
  role: ReviewRole;
  name: string;
  step: PipelineStep;
  responsibility: string;
}

const PROFILES: StageProfile[] = [
  { role: 'outcomes_strategist', name: ROLE_DISPLAY.outcomes_strategist, step: 'A', responsibility: 'Identify industry, KPIs and the solutions the client is asking for.' },
  { role: 'technical_pm', name: ROLE_DISPLAY.technical_pm, step: 'B', responsibility: 'Tier the requested solutions and estimate implementation hours.' },
  { role: 'legal_counsel', name: ROLE_DISPLAY.legal_counsel, step: 'B', responsibility: 'Audit data elements against SOC2 controls and raise blocking risks.' },
  { role: 'finance_director', name: ROLE_DISPLAY.finance_director, step: 'C', responsibility: 'Apply the margin gate to the feasibility estimate.' },
  { role: 'document_architect', name: ROLE_DISPLAY.document_architect, step: 'D', responsibility: 'Compile the approved findings into a report outline.' },
];

export function getAllStageProfiles(): StageProfile[] { return [...PROFILES]; }

export class StageRunnerRegistry {
  private runners = new Map<ReviewRole, StageRunner>();

  constructor(runners: Partial<Record<ReviewRole, StageRunner>> = {}) {
    for (const profile of PROFILES) {
      const runner = runners[profile.role];
      if (runner) this.runners.set(profile.role, runner);
    }
  }

  register(role: ReviewRole, runner: StageRunner): this {
    this.runners.set(role, runner);
    return this;
  }

  get(role: ReviewRole): StageRunner {
    const runner = this.runners.get(role);
    if (!runner) throw new InvalidInputError(`No stage runner registered for ${role}`);
    return runner;
  }
}

export function defaultStageRunners(): StageRunnerRegistry {
  return new StageRunnerRegistry({
    outcomes_strategist: targetingRunner,
    technical_pm: feasibilityRunner,
    legal_counsel: complianceRunner,
    document_architect: synthesisRunner,
  });
}

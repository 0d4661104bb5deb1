import { describe, it, expect } from 'vitest';
import { getConfig } from '../src/config.js';
import { loadKnowledge, matchDataElements, matchIndustry, matchSolutions } from '../src/knowledge/index.js';
import { complianceRunner, feasibilityRunner, highestTier, targetingRunner } from '../src/stages/index.js';
import type { StageSources } from '../src/stages/index.js';
import type { CaseEvent, StageResult } from '../src/types/index.js';
import { isLowConfidence } from '../src/types/index.js';
import { intake } from './helpers.js';

const kb = loadKnowledge(getConfig().storage.knowledge_path);
const signal = new AbortController().signal;

function sources(overrides: Partial<StageSources> = {}): StageSources {
  return {
    run_id: 'RUN-stage',
    started_at: '2025-03-01T10:00:00.000Z',
    intake: intake(),
    knowledge: kb,
    finance: getConfig().finance,
    now: () => new Date('2025-03-01T10:00:00.000Z'),
    ...overrides,
  };
}

function artifactOf(result: StageResult) {
  if (isLowConfidence(result)) throw new Error(`unexpected low confidence: ${result.reason}`);
  return result;
}

describe('Knowledge reference set', () => {
  it('loads every table with its version', () => {
    expect(kb.versions).toEqual({ industries: '2025.1', solutions: '2025.1', controls: '2025.1' });
    expect(kb.industries.map((i) => i.id)).toContain('healthcare');
    expect(kb.solutions).toHaveLength(7);
  });

  it('matches the industry with the most keyword hits', () => {
    expect(matchIndustry(kb, 'The hospital wants patient data')?.id).toBe('healthcare');
    expect(matchIndustry(kb, 'nothing relevant')).toBeNull();
  });

  it('matches solutions and data elements by keyword or field id', () => {
    expect(matchSolutions(kb, 'A CRM sync and a churn model').map((s) => s.id)).toEqual(['crm_integration', 'predictive_model']);
    expect(matchDataElements(kb, 'we store the social security number', ['diagnosis']).map((e) => e.field)).toEqual(['ssn', 'diagnosis']);
  });
});

describe('Stage runners', () => {
  it('targeting identifies industry, KPIs and requested solutions', async () => {
    const artifact = artifactOf(await targetingRunner.run('outcomes_strategist', [], sources(), signal));
    expect(artifact.findings.industry).toBe('healthcare');
    expect(artifact.findings.requested_solutions).toEqual(['kpi_dashboard']);
    expect(artifact.confidence).toBe(0.9);
    expect(artifact.run_id).toBe('RUN-stage');
  });

  it('targeting returns low confidence when nothing in the catalog matches', async () => {
    const result = await targetingRunner.run('outcomes_strategist', [], sources({
      intake: intake({ client_context: 'Unknown', transcript: 'Something vague.' }),
    }), signal);
    expect(isLowConfidence(result)).toBe(true);
    expect(isLowConfidence(result) ? result.confidence : null).toBe(0.2);
  });

  it('feasibility takes the highest tier and sums hours', async () => {
    const targeting = artifactOf(await targetingRunner.run('outcomes_strategist', [], sources({
      intake: intake({ transcript: 'A patient dashboard plus a readmission forecast.' }),
    }), signal));
    const snapshot: CaseEvent[] = [{
      sequence_no: 1, timestamp: '2025-03-01T10:00:00.000Z', source_role: 'outcomes_strategist', kind: 'StageCompleted',
      payload: { run_id: 'RUN-stage', artifact: targeting }, prev_hash: '0', hash: '1',
    }];

    const artifact = artifactOf(await feasibilityRunner.run('technical_pm', snapshot, sources(), signal));
    expect(artifact.findings.tier).toBe('custom_build');
    expect(artifact.findings.hours).toBe(280);
    expect(artifact.flags).toEqual(['custom_build_required']);
  });

  it('feasibility needs the targeting artifact of the same run', async () => {
    const result = await feasibilityRunner.run('technical_pm', [], sources(), signal);
    expect(isLowConfidence(result) ? result.reason : null).toBe('Targeting artifact missing for this run');
  });

  it('compliance raises blocking risks for high severity and advisories below', async () => {
    const artifact = artifactOf(await complianceRunner.run('legal_counsel', [], sources({
      intake: intake({ transcript: 'Export the social security number, email and diagnosis codes.' }),
    }), signal));

    expect(artifact.blocking).toBe(true);
    expect(artifact.flags).toEqual(['pii_exposure', 'phi_exposure']);
    expect(artifact.risks.map((r) => r.risk_id)).toEqual(['RISK-pii_exposure-person', 'RISK-phi_exposure-patient_record']);
    expect(artifact.risks[0].flagged_fields).toEqual(['ssn', 'email']);
    expect(artifact.risks[0].severity).toBe('critical');
    expect(artifact.findings.advisories).toEqual([]);
  });

  it('compliance keeps medium-only groups as advisories', async () => {
    const artifact = artifactOf(await complianceRunner.run('legal_counsel', [], sources({
      intake: intake({ transcript: 'Send a reminder email.' }),
    }), signal));
    expect(artifact.blocking).toBe(false);
    expect(artifact.risks).toEqual([]);
    expect(artifact.findings.advisories).toEqual(['email on person: personal data (medium)']);
  });

  it('ranks tiers', () => {
    expect(highestTier(['standard', 'customization', 'configuration'])).toBe('customization');
    expect(highestTier([])).toBe('standard');
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(targetingRunner.run('outcomes_strategist', [], sources(), controller.signal)).rejects.toThrow();
  });
});

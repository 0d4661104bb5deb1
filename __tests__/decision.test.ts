import { describe, it, expect } from 'vitest';
import {
  acceptableMitigations, classifyMarginGap, computeEfficiency, computeMargin, conflictingRequiredFields,
  evaluateFinancials, recommendContractValue, reviewProposal, selectMitigation, targetMarginFor, validateMitigation,
} from '../src/decision/index.js';
import { InvalidInputError } from '../src/errors.js';
import { characteristics } from './helpers.js';

describe('Decision Engine', () => {
  // ================================================================
  // MARGIN
  // ================================================================

  describe('computeMargin', () => {
    it('prices 480h at 175/h with 15% overhead against a 200k contract', () => {
      const { implementationCost, margin } = computeMargin(480, 175, 0.15, 200000);
      expect(implementationCost).toBeCloseTo(96600, 6);
      expect(margin).toBeCloseTo(0.517, 6);
      expect(classifyMarginGap(margin, targetMarginFor('custom_build'))).toBe('approved');
    });

    it('is deterministic', () => {
      expect(computeMargin(120, 150, 0.2, 50000)).toEqual(computeMargin(120, 150, 0.2, 50000));
    });

    it('margin strictly increases with contract value', () => {
      const margins = [100000, 150000, 200000, 400000].map((v) => computeMargin(480, 175, 0.15, v).margin);
      for (let i = 1; i < margins.length; i++) expect(margins[i]).toBeGreaterThan(margins[i - 1]);
    });

    it('rejects a non-positive contract value', () => {
      expect(() => computeMargin(10, 100, 0.1, 0)).toThrow(InvalidInputError);
      expect(() => computeMargin(10, 100, 0.1, -5)).toThrow(InvalidInputError);
    });

    it('rejects negative or non-finite inputs', () => {
      expect(() => computeMargin(-1, 100, 0.1, 1000)).toThrow(InvalidInputError);
      expect(() => computeMargin(10, Number.NaN, 0.1, 1000)).toThrow(InvalidInputError);
    });
  });

  describe('classifyMarginGap', () => {
    const target = 0.65;

    it('approves at or above target', () => {
      expect(classifyMarginGap(0.65, target)).toBe('approved');
      expect(classifyMarginGap(0.9, target)).toBe('approved');
    });

    it('maps gaps of exactly 0.05, 0.10 and 0.15 to the inclusive band', () => {
      expect(classifyMarginGap(0.60, target)).toBe('timeline_adjustment');
      expect(classifyMarginGap(0.55, target)).toBe('scope_reduction');
      expect(classifyMarginGap(0.50, target)).toBe('pricing_adjustment');
    });

    it('moves to the next band just past each boundary', () => {
      expect(classifyMarginGap(0.64, target)).toBe('timeline_adjustment');
      expect(classifyMarginGap(0.599, target)).toBe('scope_reduction');
      expect(classifyMarginGap(0.549, target)).toBe('pricing_adjustment');
      expect(classifyMarginGap(0.499, target)).toBe('rejected');
    });

    it('rejects deeply negative margins', () => {
      expect(classifyMarginGap(-1, target)).toBe('rejected');
    });

    it('holds the boundaries for the custom_build target', () => {
      expect(classifyMarginGap(0.30, 0.35)).toBe('timeline_adjustment');
      expect(classifyMarginGap(0.25, 0.35)).toBe('scope_reduction');
      expect(classifyMarginGap(0.20, 0.35)).toBe('pricing_adjustment');
    });
  });

  it('target margins follow the tier table', () => {
    expect(targetMarginFor('standard')).toBe(0.65);
    expect(targetMarginFor('configuration')).toBe(0.55);
    expect(targetMarginFor('customization')).toBe(0.45);
    expect(targetMarginFor('custom_build')).toBe(0.35);
  });

  describe('evaluateFinancials', () => {
    it('rounds the recommended contract value up to the cent', () => {
      expect(recommendContractValue(96600, 0.35)).toBe(148615.39);
    });

    it('prices at the recommended value when the client gave no budget', () => {
      const decision = evaluateFinancials({
        decision_id: 'FD-1', tier: 'custom_build', hours: 480, hourly_rate: 175, pm_overhead_pct: 0.15, contract_value: null,
      });
      expect(decision.pricing_source).toBe('recommended');
      expect(decision.contract_value).toBe(148615.39);
      expect(decision.outcome).toBe('approved');
    });

    it('records the gap against the client budget', () => {
      const decision = evaluateFinancials({
        decision_id: 'FD-2', tier: 'standard', hours: 40, hourly_rate: 175, pm_overhead_pct: 0.15, contract_value: 16500,
      });
      expect(decision.pricing_source).toBe('client_budget');
      expect(decision.computed_margin).toBeCloseTo(0.5121, 4);
      expect(decision.gap).toBeCloseTo(0.1379, 4);
      expect(decision.outcome).toBe('pricing_adjustment');
    });
  });

  it('computes client-side efficiency against the manual baseline', () => {
    expect(computeEfficiency(4, 175, 0.5)).toEqual({
      hours_saved: 3.5, cost_saved: 612.5, runtime_hours: 0.5, manual_baseline_hours: 4,
    });
    expect(computeEfficiency(4, 175, 6).hours_saved).toBe(0);
  });

  // ================================================================
  // MITIGATION
  // ================================================================

  describe('selectMitigation', () => {
    it('defaults to field redaction', () => {
      expect(selectMitigation('pii_exposure', characteristics())).toBe('field_redaction');
    });

    it('uses a filtered view for co-located or client-required PII', () => {
      expect(selectMitigation('pii_exposure', characteristics({ pii_colocated_with_business_data: true }))).toBe('filtered_sql_view');
      expect(selectMitigation('pii_exposure', characteristics({ pii_required_by_client: true }))).toBe('filtered_sql_view');
    });

    it('uses synthetic data when only structure is needed', () => {
      expect(selectMitigation('excessive_access', characteristics({ structure_only: true }))).toBe('synthetic_data_generation');
    });

    it('separates dev/test handling of PHI from other categories', () => {
      expect(selectMitigation('phi_exposure', characteristics({ dev_test_context: true }))).toBe('synthetic_data_generation');
      expect(selectMitigation('pii_exposure', characteristics({ dev_test_context: true }))).toBe('data_masking');
    });

    it('scopes excessive access with a filtered view', () => {
      expect(selectMitigation('excessive_access', characteristics())).toBe('filtered_sql_view');
    });

    it('is deterministic', () => {
      const data = characteristics({ dev_test_context: true, pii_colocated_with_business_data: true });
      expect(selectMitigation('pii_exposure', data)).toBe(selectMitigation('pii_exposure', data));
    });
  });

  describe('validateMitigation', () => {
    it('passes a filtered view for PII', () => {
      expect(validateMitigation('filtered_sql_view', 'pii_exposure')).toEqual({ satisfiesMinimization: true, satisfiesLeastPrivilege: true });
    });

    it('fails least privilege for masked PII', () => {
      expect(validateMitigation('data_masking', 'pii_exposure')).toEqual({ satisfiesMinimization: true, satisfiesLeastPrivilege: false });
    });

    it('offers only mitigations passing both checks', () => {
      expect(acceptableMitigations('excessive_access')).toEqual(['filtered_sql_view']);
      expect(acceptableMitigations('cross_border_transfer')).toEqual(['field_redaction', 'synthetic_data_generation', 'data_masking']);
    });
  });

  it('flags required personal-data fields as irreconcilable', () => {
    expect(conflictingRequiredFields('pii_exposure', ['ssn', 'date_of_birth'], ['ssn'])).toEqual(['ssn']);
    expect(conflictingRequiredFields('cross_border_transfer', ['eu_customer_data'], ['eu_customer_data'])).toEqual([]);
  });

  it('accepts a proposal only when it passes both checks and covers every flagged field', () => {
    const full = reviewProposal('pii_exposure', ['ssn'], { mitigation: 'filtered_sql_view', exclusion_scope: ['ssn'], rationale: '' });
    expect(full.verdict).toBe('accept');

    const partial = reviewProposal('pii_exposure', ['ssn', 'email'], { mitigation: 'filtered_sql_view', exclusion_scope: ['ssn'], rationale: '' });
    expect(partial.verdict).toBe('reject');
    expect(partial.uncovered_fields).toEqual(['email']);
  });
});

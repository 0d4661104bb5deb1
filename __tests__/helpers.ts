/**
 * Shared fixtures: intakes, risks and a service wired to in-memory storage.
 */

import { getConfig, mergeConfig } from '../src/config.js';
import type { ConfigOverrides } from '../src/config.js';
import { MemoryEscalationChannel } from '../src/escalation/index.js';
import { AssessmentService } from '../src/service.js';
import type { AssessmentServiceOptions } from '../src/service.js';
import { MemoryCaseStorage } from '../src/storage/index.js';
import type { AssessmentIntake, DataCharacteristics, Risk } from '../src/types/index.js';

export const HOSPITAL = 'Regional hospital group';
export const DASHBOARD_REQUEST = 'Clinic managers want a dashboard of patient wait times.';

export function characteristics(overrides: Partial<DataCharacteristics> = {}): DataCharacteristics {
  return {
    pii_required_by_client: false,
    pii_colocated_with_business_data: false,
    structure_only: false,
    dev_test_context: false,
    ...overrides,
  };
}

export function intake(overrides: Partial<AssessmentIntake> = {}): AssessmentIntake {
  return {
    client_context: HOSPITAL,
    transcript: DASHBOARD_REQUEST,
    contract_value: 30000,
    required_fields: [],
    data_characteristics: characteristics(),
    ...overrides,
  };
}

export function risk(overrides: Partial<Risk> = {}): Risk {
  return {
    risk_id: 'RISK-pii_exposure-person',
    category: 'pii_exposure',
    severity: 'high',
    affected_entity: 'person',
    raised_by: 'legal_counsel',
    description: 'date_of_birth on person: personal data',
    flagged_fields: ['date_of_birth'],
    required_fields: [],
    data_characteristics: characteristics(),
    ...overrides,
  };
}

export function testService(
  options: Omit<AssessmentServiceOptions, 'config'> = {},
  config: ConfigOverrides = {},
): { service: AssessmentService; escalation: MemoryEscalationChannel; storage: MemoryCaseStorage } {
  const escalation = new MemoryEscalationChannel();
  const storage = new MemoryCaseStorage();
  const service = new AssessmentService({
    storage,
    escalation,
    ...options,
    config: mergeConfig(getConfig(), config),
  });
  return { service, escalation, storage };
}

/**
 * Compliance (legal_counsel): audits the data elements the engagement touches
 * against the SOC2 control table.
 *
 * Elements are grouped by (category, entity). A group at high or critical
 * severity becomes a blocking Risk; anything lower is reported as an advisory.
 */

import { matchDataElements } from '../knowledge/index.js';
import type { DataElement } from '../knowledge/index.js';
import type { Risk, RiskCategory, RiskSeverity } from '../types/index.js';
import type { StageRunner } from './types.js';
import { buildArtifact } from './types.js';

const SEVERITY_RANK: Record<RiskSeverity, number> = { low: 0, medium: 1, high: 2, critical: 3 };

const CATEGORY_LABEL: Record<RiskCategory, string> = {
  pii_exposure: 'personal data',
  phi_exposure: 'health data',
  cross_border_transfer: 'cross-border transfer',
  excessive_access: 'excessive access',
};

interface ElementGroup {
  category: RiskCategory;
  entity: string;
  severity: RiskSeverity;
  fields: string[];
}

function groupElements(elements: readonly DataElement[]): ElementGroup[] {
  const groups = new Map<string, ElementGroup>();
  for (const e of elements) {
    const key = `${e.category}-${e.entity}`;
    const group = groups.get(key);
    if (!group) {
      groups.set(key, { category: e.category, entity: e.entity, severity: e.severity, fields: [e.field] });
      continue;
    }
    if (!group.fields.includes(e.field)) group.fields.push(e.field);
    if (SEVERITY_RANK[e.severity] > SEVERITY_RANK[group.severity]) group.severity = e.severity;
  }
  return [...groups.values()];
}

export const complianceRunner: StageRunner = {
  async run(role, _snapshot, sources, signal) {
    signal.throwIfAborted();
    const { intake } = sources;
    const text = `${intake.client_context}\n${intake.transcript}`;
    const elements = matchDataElements(sources.knowledge, text, intake.required_fields);

    const risks: Risk[] = [];
    const advisories: string[] = [];
    for (const group of groupElements(elements)) {
      const description = `${group.fields.join(', ')} on ${group.entity}: ${CATEGORY_LABEL[group.category]}`;
      if (SEVERITY_RANK[group.severity] < SEVERITY_RANK.high) {
        advisories.push(`${description} (${group.severity})`);
        continue;
      }
      risks.push({
        risk_id: `RISK-${group.category}-${group.entity}`,
        category: group.category,
        severity: group.severity,
        affected_entity: group.entity,
        raised_by: role,
        description,
        flagged_fields: group.fields,
        required_fields: [...intake.required_fields],
        data_characteristics: { ...intake.data_characteristics },
      });
    }

    return buildArtifact(role, sources, {
      flags: [...new Set(risks.map((r) => r.category))],
      blocking: risks.length > 0,
      confidence: 0.9,
      risks,
      findings: {
        data_elements: elements.map((e) => ({
          field: e.field, control_id: e.control_id, control: e.control, severity: e.severity,
        })),
        advisories,
        controls_version: sources.knowledge.versions.controls,
      },
    });
  },
};

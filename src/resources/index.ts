/**
 * MCP Resource registrations: read-only data endpoints.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AssessmentService } from '../service.js';
import { getAuditStats, queryAuditLog } from '../storage/index.js';
import { getAllStageProfiles } from '../stages/index.js';

export function registerResources(server: McpServer, service: AssessmentService): void {

  server.resource('cases', 'assessment://cases', { description: 'All assessment cases with report status', mimeType: 'application/json' }, async (uri) => {
    const cases = service.listCases();
    return { contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify({ total: cases.length, by_status: countBy(cases.map((c) => c.status)), cases }, null, 2) }] };
  });

  server.resource('audit', 'assessment://audit', { description: 'Recent audit trail and action counts', mimeType: 'application/json' }, async (uri) => {
    return { contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify({ stats: getAuditStats(), recent: queryAuditLog({ limit: 50 }) }, null, 2) }] };
  });

  server.resource('stages', 'assessment://stages', { description: 'Pipeline stages, their roles and steps', mimeType: 'text/markdown' }, async (uri) => {
    const lines = ['# Pipeline Stages', ''];
    for (const p of getAllStageProfiles()) lines.push(`- **${p.name}** (${p.role}), step ${p.step}: ${p.responsibility}`);
    return { contents: [{ uri: uri.href, mimeType: 'text/markdown', text: lines.join('\n') }] };
  });
}

function countBy(values: string[]): Record<string, number> {
  const g: Record<string, number> = {};
  for (const v of values) g[v] = (g[v] ?? 0) + 1;
  return g;
}

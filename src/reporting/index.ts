/**
 * Reporting facade.
 */
export {
  resolveReportStatus, listBlockers, buildCaseView,
  interventionBlockers, financialBlockers, artifactBlockers,
} from './status.js';

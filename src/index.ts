export {
  ClinicalReasoningEngine,
  createClinicalReasoningEngine,
  type CreateEngineOptions,
  type EvaluationResult,
  type EvaluationSummary,
} from './services/clinicalReasoningEngine';
export {
  propagateConfidence,
  resolveEngineOptions,
  type EngineOptions,
  type ResolvedEngineOptions,
} from './services/engineOptions';
export { validateRecords, type NormalizedRecord } from './services/recordValidation';
export {
  buildTimeline,
  findConcurrentUse,
  findTreatmentGaps,
  isActiveOn,
  summarizeTimeline,
  type TimelineBuildResult,
  type TimelineSummary,
} from './services/timelineBuilder';
export {
  compareVisits,
  detectChanges,
  visibleChanges,
  type ChangeDetectionResult,
  type VisitComparison,
} from './services/changeDetector';
export { evaluateSafety, involvedEntities, overallRiskLevel } from './services/medicationSafety';
export {
  composeEvidence,
  confidenceLabel,
  explainChange,
  explainFinding,
  type EvidenceBundle,
  type ExplainedChange,
  type ExplainedFinding,
  type Rationale,
  type ReviewItem,
} from './services/evidenceComposer';
export {
  graphStatistics,
  nodeId,
  projectKnowledgeGraph,
  type GraphEdge,
  type GraphNode,
  type KnowledgeGraph,
} from './services/knowledgeGraph';
export {
  buildRuleCatalog,
  getRuleCatalog,
  loadRuleCatalog,
  RuleCatalog,
  type RawRuleCatalog,
} from './data/ruleCatalog';
export {
  CatalogLoadError,
  EngineConfigurationError,
  PatientContextValidationError,
} from './services/common/errors';
export { normalizeDrugIdentity } from './utils/medicationName';
export * from './types/clinical';

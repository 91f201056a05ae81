/**
 * Clinical Reasoning Engine
 *
 * Runs one patient evaluation end to end:
 * validate records → build timeline → detect changes → evaluate safety on the
 * active set → compose evidence → project the knowledge graph.
 *
 * Evaluation is synchronous and performs no I/O; the rule catalog is loaded
 * once when the engine is created and shared read-only afterwards.
 */

import * as functions from 'firebase-functions';
import { z } from 'zod';

import { getRuleCatalog, type RuleCatalog } from '../data/ruleCatalog';
import type {
  ChangeEvent,
  Diagnostic,
  DiagnosticKind,
  IsoDate,
  PatientContext,
  RiskLevel,
  Severity,
  TimelineSnapshot,
  TreatmentGap,
} from '../types/clinical';
import { isIsoDate } from '../utils/dates';
import { captureException, initSentry } from '../utils/sentry';
import { detectChanges } from './changeDetector';
import { PatientContextValidationError } from './common/errors';
import { resolveEngineOptions, type EngineOptions, type ResolvedEngineOptions } from './engineOptions';
import {
  composeEvidence,
  type ExplainedChange,
  type ExplainedFinding,
  type ReviewItem,
} from './evidenceComposer';
import {
  graphStatistics,
  projectKnowledgeGraph,
  type GraphStatistics,
  type KnowledgeGraph,
} from './knowledgeGraph';
import { evaluateSafety, overallRiskLevel } from './medicationSafety';
import { validateRecords } from './recordValidation';
import { buildTimeline, summarizeTimeline, type TimelineSummary } from './timelineBuilder';

const patientContextSchema = z.object({
  asOfDate: z.string().refine(isIsoDate, { message: 'must be a valid YYYY-MM-DD date' }),
  allergies: z.array(
    z.union([
      z.string(),
      z.object({ substance: z.string().min(1), reaction: z.string().optional() }),
    ]),
  ),
  chronicConditions: z.array(z.string()),
  patientId: z.string().min(1).optional(),
});

export interface EvaluationSummary {
  timeline: TimelineSummary;
  findingsBySeverity: Record<Severity, number>;
  changeCount: number;
  pendingReviewCount: number;
  diagnosticCounts: Partial<Record<DiagnosticKind, number>>;
  graph: GraphStatistics;
}

export interface EvaluationResult {
  asOfDate: IsoDate;
  catalogVersion: string;
  snapshot: TimelineSnapshot;
  /** Every change with its rationale, `continued` included. */
  changes: ExplainedChange[];
  gaps: TreatmentGap[];
  /** Headline findings, most severe first. */
  findings: ExplainedFinding[];
  pendingReview: ReviewItem[];
  riskLevel: RiskLevel;
  graph: KnowledgeGraph;
  summary: EvaluationSummary;
  diagnostics: Diagnostic[];
}

const DIAGNOSTIC_ORDER: DiagnosticKind[] = [
  'invalid_record',
  'future_record',
  'ambiguous_same_day',
  'orphan_discontinuation',
  'overlapping_regimens',
  'unit_mismatch',
  'catalog_gap',
  'allowlisted_combination',
];

const sortDiagnostics = (diagnostics: Diagnostic[]): Diagnostic[] =>
  diagnostics
    .map((diagnostic) => ({ diagnostic, key: JSON.stringify(diagnostic) }))
    .sort(
      (a, b) =>
        DIAGNOSTIC_ORDER.indexOf(a.diagnostic.kind) - DIAGNOSTIC_ORDER.indexOf(b.diagnostic.kind) ||
        (a.key < b.key ? -1 : a.key > b.key ? 1 : 0),
    )
    .map((entry) => entry.diagnostic);

export class ClinicalReasoningEngine {
  private readonly options: ResolvedEngineOptions;

  constructor(
    private readonly catalog: RuleCatalog,
    options: EngineOptions = {},
  ) {
    this.options = resolveEngineOptions(options);
  }

  get catalogVersion(): string {
    return this.catalog.version;
  }

  /**
   * Evaluate one patient. Invalid records are dropped with diagnostics; an
   * invalid patient context throws PatientContextValidationError.
   */
  evaluate(records: ReadonlyArray<unknown>, context: PatientContext): EvaluationResult {
    const parsedContext = patientContextSchema.safeParse(context);
    if (!parsedContext.success) {
      const issues = parsedContext.error.issues.map(
        (issue) => `${issue.path.join('.') || 'context'}: ${issue.message}`,
      );
      throw new PatientContextValidationError('Invalid patient context', issues);
    }

    try {
      return this.run(records, parsedContext.data);
    } catch (error) {
      captureException(error, {
        stage: 'evaluate',
        asOfDate: context.asOfDate,
        recordCount: records.length,
      });
      throw error;
    }
  }

  private run(rawRecords: ReadonlyArray<unknown>, context: PatientContext): EvaluationResult {
    const { asOfDate } = context;
    const validation = validateRecords(rawRecords);
    const timeline = buildTimeline(validation.records, asOfDate, this.options);
    const detected = detectChanges(timeline.snapshot.byDrug, asOfDate, this.options);
    const safety = evaluateSafety(timeline.snapshot.active, context, this.catalog, this.options);
    const evidence = composeEvidence(safety.findings, detected.changes, this.catalog.version, this.options);
    const headline = evidence.findings.map((entry) => entry.finding);
    // Findings held for review are not asserted as graph edges.
    const graph = projectKnowledgeGraph(timeline.records, context, headline);

    const diagnostics = sortDiagnostics([
      ...validation.diagnostics,
      ...timeline.diagnostics,
      ...detected.diagnostics,
      ...safety.diagnostics,
    ]);
    const riskLevel = overallRiskLevel(headline);
    const summary = this.summarize(
      timeline.snapshot,
      detected.changes,
      evidence.findings,
      evidence.pendingReview,
      diagnostics,
      graph,
    );

    functions.logger.info('[clinicalReasoningEngine] Evaluation complete', {
      asOfDate,
      catalogVersion: this.catalog.version,
      records: rawRecords.length,
      validRecords: validation.records.length,
      periods: timeline.snapshot.periods.length,
      changes: detected.changes.length,
      findings: evidence.findings.length,
      pendingReview: evidence.pendingReview.length,
      diagnostics: diagnostics.length,
      riskLevel,
    });

    return {
      asOfDate,
      catalogVersion: this.catalog.version,
      snapshot: timeline.snapshot,
      changes: evidence.changes,
      gaps: detected.gaps,
      findings: evidence.findings,
      pendingReview: evidence.pendingReview,
      riskLevel,
      graph,
      summary,
      diagnostics,
    };
  }

  private summarize(
    snapshot: TimelineSnapshot,
    changes: ReadonlyArray<ChangeEvent>,
    findings: ReadonlyArray<ExplainedFinding>,
    pendingReview: ReadonlyArray<ReviewItem>,
    diagnostics: ReadonlyArray<Diagnostic>,
    graph: KnowledgeGraph,
  ): EvaluationSummary {
    const findingsBySeverity: Record<Severity, number> = {
      contraindicated: 0,
      major: 0,
      moderate: 0,
      minor: 0,
    };
    findings.forEach(({ finding }) => {
      findingsBySeverity[finding.severity] += 1;
    });

    const diagnosticCounts: Partial<Record<DiagnosticKind, number>> = {};
    diagnostics.forEach((diagnostic) => {
      diagnosticCounts[diagnostic.kind] = (diagnosticCounts[diagnostic.kind] ?? 0) + 1;
    });

    return {
      timeline: summarizeTimeline(snapshot),
      findingsBySeverity,
      changeCount: changes.length,
      pendingReviewCount: pendingReview.length,
      diagnosticCounts,
      graph: graphStatistics(graph),
    };
  }
}

export interface CreateEngineOptions extends EngineOptions {
  /** Catalog to use instead of the process-wide one. */
  catalog?: RuleCatalog;
}

/**
 * Create an engine: initializes error reporting and loads the rule catalog.
 * Throws CatalogLoadError when the catalog cannot be loaded.
 */
export function createClinicalReasoningEngine(options: CreateEngineOptions = {}): ClinicalReasoningEngine {
  initSentry();
  const { catalog, ...engineOptions } = options;
  return new ClinicalReasoningEngine(catalog ?? getRuleCatalog(), engineOptions);
}

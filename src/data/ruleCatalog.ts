/**
 * Rule Catalog
 *
 * Versioned, read-only drug safety knowledge: therapeutic classes, drug→class
 * membership, drug-drug and class-class interaction rules, contraindications,
 * allergy cross-reactivity and the combination-therapy allowlist.
 *
 * The catalog is validated with zod, checked for referential integrity and
 * frozen. Lookups go through maps keyed by normalized identifiers (pair keys
 * for interactions), so every lookup is O(1).
 */

import * as fs from 'fs';
import * as path from 'path';
import * as functions from 'firebase-functions';
import { z } from 'zod';

import { catalogConfig } from '../config';
import { CatalogLoadError } from '../services/common/errors';
import { captureException } from '../utils/sentry';
import {
  compareIdentifiers,
  normalizeDrugIdentity,
  normalizeTerm,
  pairKey,
} from '../utils/medicationName';
import {
  SEVERITY_RANK,
  type ClassInteractionRule,
  type ContraindicationRule,
  type DrugInteractionRule,
  type Severity,
} from '../types/clinical';

// =============================================================================
// Schemas
// =============================================================================

const severitySchema = z.enum(['minor', 'moderate', 'major', 'contraindicated']);
const confidenceSchema = z.number().min(0).max(1).optional();

const metaSchema = z.object({
  version: z.string().min(1),
  description: z.string().optional(),
});

const therapeuticClassSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  broad: z.boolean().optional(),
  duplicateSeverity: severitySchema.optional(),
});

const membershipSchema = z.object({
  drug: z.string().min(1),
  class: z.string().min(1),
});

const drugInteractionSchema = z.object({
  id: z.string().min(1),
  drugA: z.string().min(1),
  drugB: z.string().min(1),
  severity: severitySchema,
  mechanism: z.string().min(1),
  management: z.string().min(1),
  confidence: confidenceSchema,
});

const classInteractionSchema = z.object({
  id: z.string().min(1),
  classA: z.string().min(1),
  classB: z.string().min(1),
  severity: severitySchema,
  mechanism: z.string().min(1),
  management: z.string().min(1),
  confidence: confidenceSchema,
});

const contraindicationSchema = z.object({
  id: z.string().min(1),
  drugOrClass: z.string().min(1),
  condition: z.string().min(1),
  severity: severitySchema,
  mechanism: z.string().min(1),
  management: z.string().default(''),
  confidence: confidenceSchema,
});

const crossReactivitySchema = z.object({
  id: z.string().min(1),
  allergen: z.string().min(1),
  target: z.string().min(1),
  severity: severitySchema,
  mechanism: z.string().min(1),
});

const reactionSeveritySchema = z.object({
  reaction: z.string().min(1),
  severity: severitySchema,
});

const combinationTherapySchema = z.object({
  id: z.string().min(1),
  therapeuticClass: z.string().min(1),
  drugs: z.array(z.string().min(1)).min(2),
  reason: z.string().min(1),
});

export const rawRuleCatalogSchema = z.object({
  meta: metaSchema,
  therapeuticClasses: z.array(therapeuticClassSchema),
  classMembership: z.array(membershipSchema),
  drugInteractions: z.array(drugInteractionSchema),
  classInteractions: z.array(classInteractionSchema),
  contraindications: z.array(contraindicationSchema),
  allergyRules: z
    .object({
      crossReactivity: z.array(crossReactivitySchema).default([]),
      reactionSeverities: z.array(reactionSeveritySchema).default([]),
    })
    .default({}),
  combinationTherapies: z.array(combinationTherapySchema).default([]),
});

export type RawRuleCatalog = z.input<typeof rawRuleCatalogSchema>;

/** File name for each top-level catalog section. */
const CATALOG_FILES: Record<keyof z.infer<typeof rawRuleCatalogSchema>, string> = {
  meta: 'meta.json',
  therapeuticClasses: 'therapeuticClasses.json',
  classMembership: 'classMembership.json',
  drugInteractions: 'drugInteractions.json',
  classInteractions: 'classInteractions.json',
  contraindications: 'contraindications.json',
  allergyRules: 'allergyRules.json',
  combinationTherapies: 'combinationTherapies.json',
};

// =============================================================================
// Catalog types
// =============================================================================

export interface TherapeuticClass {
  id: string;
  name: string;
  broad: boolean;
  duplicateSeverity: Severity;
}

export interface CrossReactivityRule {
  id: string;
  allergen: string;
  /** Therapeutic class id or drug identity the allergen cross-reacts with. */
  target: string;
  severity: Severity;
  mechanism: string;
}

export interface CombinationAllowance {
  id: string;
  therapeuticClass: string;
  drugs: string[];
  reason: string;
}

export interface ClassInteractionMatch {
  rule: ClassInteractionRule;
  /** Oriented to the caller: first class belongs to the first drug. */
  classes: [string, string];
}

export interface ContraindicationMatch {
  rule: ContraindicationRule;
  matchedVia: 'drug' | 'class';
}

export interface RuleCatalogStats {
  version: string;
  classes: number;
  drugs: number;
  drugInteractions: number;
  classInteractions: number;
  contraindications: number;
  crossReactivityRules: number;
  combinationAllowances: number;
}

const bySeverityThenId = <T extends { severity: Severity; id: string }>(a: T, b: T): number =>
  SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] || compareIdentifiers(a.id, b.id);

const freezeAll = <T extends object>(items: T[]): ReadonlyArray<Readonly<T>> =>
  Object.freeze(items.map((item) => Object.freeze(item)));

// =============================================================================
// RuleCatalog
// =============================================================================

export class RuleCatalog {
  readonly version: string;
  private readonly classes: ReadonlyMap<string, Readonly<TherapeuticClass>>;
  private readonly membership: ReadonlyMap<string, ReadonlyArray<string>>;
  private readonly drugRules: ReadonlyMap<string, Readonly<DrugInteractionRule>>;
  private readonly classRules: ReadonlyMap<string, ReadonlyArray<Readonly<ClassInteractionRule>>>;
  private readonly contraindicationsByCondition: ReadonlyMap<
    string,
    ReadonlyArray<Readonly<ContraindicationRule>>
  >;
  private readonly crossReactivity: ReadonlyMap<string, ReadonlyArray<Readonly<CrossReactivityRule>>>;
  private readonly reactionSeverities: ReadonlyMap<string, Severity>;
  private readonly allowances: ReadonlyArray<Readonly<CombinationAllowance>>;
  private readonly ruleCount: { contraindications: number; crossReactivity: number; classRules: number };

  constructor(parts: {
    version: string;
    classes: TherapeuticClass[];
    membership: Map<string, string[]>;
    drugRules: DrugInteractionRule[];
    classRules: ClassInteractionRule[];
    contraindications: ContraindicationRule[];
    crossReactivity: CrossReactivityRule[];
    reactionSeverities: Map<string, Severity>;
    allowances: CombinationAllowance[];
  }) {
    this.version = parts.version;
    this.classes = new Map<string, Readonly<TherapeuticClass>>(
      freezeAll(parts.classes).map((entry) => [entry.id, entry]),
    );
    this.membership = new Map<string, ReadonlyArray<string>>(
      Array.from(parts.membership.entries()).map(([drug, classes]) => [
        drug,
        Object.freeze([...classes].sort()),
      ]),
    );
    this.drugRules = new Map<string, Readonly<DrugInteractionRule>>(
      freezeAll(parts.drugRules).map((rule) => [pairKey(rule.drugA, rule.drugB), rule]),
    );
    this.classRules = groupFrozen(parts.classRules, (rule) => pairKey(rule.classA, rule.classB));
    this.contraindicationsByCondition = groupFrozen(parts.contraindications, (rule) => rule.condition);
    this.crossReactivity = groupFrozen(parts.crossReactivity, (rule) => rule.allergen);
    this.reactionSeverities = new Map(parts.reactionSeverities);
    this.allowances = freezeAll(parts.allowances);
    this.ruleCount = {
      contraindications: parts.contraindications.length,
      crossReactivity: parts.crossReactivity.length,
      classRules: parts.classRules.length,
    };
    Object.freeze(this);
  }

  classById(id: string): Readonly<TherapeuticClass> | undefined {
    return this.classes.get(normalizeTerm(id));
  }

  classesOf(drug: string): ReadonlyArray<string> {
    return this.membership.get(drug) ?? [];
  }

  isKnownDrug(drug: string): boolean {
    return this.membership.has(drug);
  }

  /** Exact drug pair rule; argument order does not matter. */
  findDrugInteraction(drugA: string, drugB: string): Readonly<DrugInteractionRule> | undefined {
    return this.drugRules.get(pairKey(drugA, drugB));
  }

  /**
   * Every class-class rule matching any pairing of the two class lists,
   * most severe first. Each rule is reported once.
   */
  findClassInteractions(
    classesA: ReadonlyArray<string>,
    classesB: ReadonlyArray<string>,
  ): ClassInteractionMatch[] {
    const matches = new Map<string, ClassInteractionMatch>();

    for (const classA of classesA) {
      for (const classB of classesB) {
        const rules = this.classRules.get(pairKey(classA, classB)) ?? [];
        for (const rule of rules) {
          if (!matches.has(rule.id)) {
            matches.set(rule.id, { rule, classes: [classA, classB] });
          }
        }
      }
    }

    return Array.from(matches.values()).sort((a, b) => bySeverityThenId(a.rule, b.rule));
  }

  /**
   * Contraindications of a drug (directly or through one of its classes) for
   * one condition, most severe first; drug-level matches rank ahead of class
   * matches at equal severity.
   */
  findContraindications(
    drug: string,
    classes: ReadonlyArray<string>,
    condition: string,
  ): ContraindicationMatch[] {
    const rules = this.contraindicationsByCondition.get(normalizeTerm(condition)) ?? [];
    const matches: ContraindicationMatch[] = [];

    for (const rule of rules) {
      if (rule.drugOrClass === drug) {
        matches.push({ rule, matchedVia: 'drug' });
      } else if (classes.includes(rule.drugOrClass)) {
        matches.push({ rule, matchedVia: 'class' });
      }
    }

    return matches.sort(
      (a, b) =>
        SEVERITY_RANK[b.rule.severity] - SEVERITY_RANK[a.rule.severity] ||
        (a.matchedVia === b.matchedVia ? 0 : a.matchedVia === 'drug' ? -1 : 1) ||
        compareIdentifiers(a.rule.id, b.rule.id),
    );
  }

  crossReactivityFor(allergen: string): ReadonlyArray<Readonly<CrossReactivityRule>> {
    return this.crossReactivity.get(normalizeTerm(allergen)) ?? [];
  }

  reactionSeverity(reaction: string): Severity | undefined {
    return this.reactionSeverities.get(normalizeTerm(reaction));
  }

  /**
   * Allowance covering a duplicate-therapy group: same class and every
   * active member listed by the allowance.
   */
  findCombinationAllowance(
    therapeuticClass: string,
    drugs: ReadonlyArray<string>,
  ): Readonly<CombinationAllowance> | undefined {
    return this.allowances.find(
      (allowance) =>
        allowance.therapeuticClass === therapeuticClass &&
        drugs.every((drug) => allowance.drugs.includes(drug)),
    );
  }

  stats(): RuleCatalogStats {
    return {
      version: this.version,
      classes: this.classes.size,
      drugs: this.membership.size,
      drugInteractions: this.drugRules.size,
      classInteractions: this.ruleCount.classRules,
      contraindications: this.ruleCount.contraindications,
      crossReactivityRules: this.ruleCount.crossReactivity,
      combinationAllowances: this.allowances.length,
    };
  }
}

function groupFrozen<T extends object>(
  items: T[],
  keyOf: (item: T) => string,
): ReadonlyMap<string, ReadonlyArray<Readonly<T>>> {
  const grouped = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const bucket = grouped.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      grouped.set(key, [item]);
    }
  }
  return new Map<string, ReadonlyArray<Readonly<T>>>(
    Array.from(grouped.entries()).map(([key, bucket]) => [key, freezeAll(bucket)]),
  );
}

// =============================================================================
// Building and loading
// =============================================================================

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * Validate an in-memory catalog, normalize its identifiers and check that
 * every class reference resolves. Throws CatalogLoadError on any problem.
 */
export function buildRuleCatalog(raw: unknown, source = 'inline'): RuleCatalog {
  const parsed = rawRuleCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogLoadError(`Rule catalog failed validation: ${formatIssues(parsed.error)}`, source);
  }

  const data = parsed.data;
  const problems: string[] = [];
  const seenRuleIds = new Set<string>();
  const claimRuleId = (id: string) => {
    if (seenRuleIds.has(id)) {
      problems.push(`duplicate rule id "${id}"`);
    }
    seenRuleIds.add(id);
  };

  const classes: TherapeuticClass[] = data.therapeuticClasses.map((entry) => ({
    id: normalizeTerm(entry.id),
    name: entry.name,
    broad: entry.broad ?? false,
    duplicateSeverity: entry.duplicateSeverity ?? 'moderate',
  }));
  const classIds = new Set<string>();
  for (const entry of classes) {
    if (classIds.has(entry.id)) {
      problems.push(`duplicate therapeutic class "${entry.id}"`);
    }
    classIds.add(entry.id);
  }

  const requireClass = (id: string, where: string): string => {
    const normalized = normalizeTerm(id);
    if (!classIds.has(normalized)) {
      problems.push(`${where} references unknown therapeutic class "${id}"`);
    }
    return normalized;
  };

  const membership = new Map<string, string[]>();
  for (const row of data.classMembership) {
    const drug = normalizeDrugIdentity(row.drug);
    const classId = requireClass(row.class, `classMembership for "${row.drug}"`);
    const current = membership.get(drug) ?? [];
    if (!current.includes(classId)) {
      current.push(classId);
    }
    membership.set(drug, current);
  }

  const drugRules: DrugInteractionRule[] = [];
  const drugPairs = new Set<string>();
  for (const rule of data.drugInteractions) {
    claimRuleId(rule.id);
    const drugA = normalizeDrugIdentity(rule.drugA);
    const drugB = normalizeDrugIdentity(rule.drugB);
    const key = pairKey(drugA, drugB);
    if (drugPairs.has(key)) {
      problems.push(`drug pair ${drugA}/${drugB} has more than one rule`);
    }
    drugPairs.add(key);
    drugRules.push({ ...rule, drugA, drugB });
  }

  const classRules: ClassInteractionRule[] = data.classInteractions.map((rule) => {
    claimRuleId(rule.id);
    return {
      ...rule,
      classA: requireClass(rule.classA, `class rule ${rule.id}`),
      classB: requireClass(rule.classB, `class rule ${rule.id}`),
    };
  });

  const contraindications: ContraindicationRule[] = data.contraindications.map((rule) => {
    claimRuleId(rule.id);
    const asClass = normalizeTerm(rule.drugOrClass);
    return {
      ...rule,
      drugOrClass: classIds.has(asClass) ? asClass : normalizeDrugIdentity(rule.drugOrClass),
      condition: normalizeTerm(rule.condition),
    };
  });

  const crossReactivity: CrossReactivityRule[] = data.allergyRules.crossReactivity.map((rule) => {
    claimRuleId(rule.id);
    const asClass = normalizeTerm(rule.target);
    return {
      ...rule,
      allergen: normalizeTerm(rule.allergen),
      target: classIds.has(asClass) ? asClass : normalizeDrugIdentity(rule.target),
    };
  });

  const reactionSeverities = new Map<string, Severity>(
    data.allergyRules.reactionSeverities.map((entry) => [normalizeTerm(entry.reaction), entry.severity]),
  );

  const allowances: CombinationAllowance[] = data.combinationTherapies.map((entry) => {
    claimRuleId(entry.id);
    return {
      ...entry,
      therapeuticClass: requireClass(entry.therapeuticClass, `combination therapy ${entry.id}`),
      drugs: entry.drugs.map(normalizeDrugIdentity),
    };
  });

  if (problems.length > 0) {
    throw new CatalogLoadError(`Rule catalog failed integrity checks: ${problems.join('; ')}`, source);
  }

  return new RuleCatalog({
    version: data.meta.version,
    classes,
    membership,
    drugRules,
    classRules,
    contraindications,
    crossReactivity,
    reactionSeverities,
    allowances,
  });
}

function readCatalogFile(directory: string, fileName: string): unknown {
  const filePath = path.join(directory, fileName);
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`Unable to read catalog file ${fileName}: ${reason}`, filePath);
  }

  try {
    return JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`Catalog file ${fileName} is not valid JSON: ${reason}`, filePath);
  }
}

/**
 * Read every catalog file from a directory and build the catalog.
 * A missing or corrupt file fails the whole load.
 */
export function loadRuleCatalog(directory: string = catalogConfig.directory): RuleCatalog {
  const raw: Record<string, unknown> = {};
  for (const [section, fileName] of Object.entries(CATALOG_FILES)) {
    raw[section] = readCatalogFile(directory, fileName);
  }

  const catalog = buildRuleCatalog(raw, directory);
  functions.logger.info('[ruleCatalog] Loaded rule catalog', catalog.stats());
  return catalog;
}

let sharedCatalog: RuleCatalog | null = null;

/**
 * Process-wide catalog, loaded on first use from the configured directory.
 */
export function getRuleCatalog(): RuleCatalog {
  if (sharedCatalog) {
    return sharedCatalog;
  }

  try {
    sharedCatalog = loadRuleCatalog(catalogConfig.directory);
  } catch (error) {
    captureException(error, { directory: catalogConfig.directory });
    throw error;
  }
  return sharedCatalog;
}

export function clearRuleCatalogCacheForTests(): void {
  sharedCatalog = null;
}

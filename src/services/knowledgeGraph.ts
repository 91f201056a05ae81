/**
 * Knowledge Graph Projector
 *
 * Projects records, patient context and findings into a node arena plus an
 * edge list for visualization. Node ids are content-addressed, so the same
 * inputs always produce the same graph.
 */

import crypto from 'crypto';

import type { Finding, MedicationRecord, PatientContext } from '../types/clinical';
import { compareIdentifiers, normalizeDrugIdentity, normalizeTerm } from '../utils/medicationName';

export type GraphNodeType = 'patient' | 'medication' | 'condition' | 'allergy' | 'symptom';

export type GraphEdgeType =
  | 'takes'
  | 'has_condition'
  | 'has_allergy'
  | 'prescribed_for'
  | 'interacts_with'
  | 'duplicates'
  | 'contraindicated_by'
  | 'allergic_to';

export interface GraphNode {
  id: string;
  type: GraphNodeType;
  key: string;
  label: string;
}

export interface GraphEdge {
  id: string;
  type: GraphEdgeType;
  source: string;
  target: string;
  /** Record ids or finding ids that support the edge. */
  evidence: string[];
}

export interface KnowledgeGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface GraphStatistics {
  nodeCount: number;
  edgeCount: number;
  nodesByType: Record<GraphNodeType, number>;
  edgesByType: Record<GraphEdgeType, number>;
}

const hashId = (prefix: string, content: string): string =>
  `${prefix}:${crypto.createHash('sha1').update(content).digest('hex').slice(0, 16)}`;

export function nodeId(type: GraphNodeType, key: string): string {
  return hashId(type, `${type}|${key}`);
}

class GraphBuilder {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();

  node(type: GraphNodeType, key: string, label: string): string {
    const id = nodeId(type, key);
    const existing = this.nodes.get(id);
    // Spellings of one key can differ between records; keep the lowest label.
    if (!existing || compareIdentifiers(label, existing.label) < 0) {
      this.nodes.set(id, { id, type, key, label });
    }
    return id;
  }

  edge(type: GraphEdgeType, source: string, target: string, evidence: string[]): void {
    const id = hashId('edge', `${type}|${source}|${target}`);
    const existing = this.edges.get(id);
    if (existing) {
      existing.evidence = Array.from(new Set([...existing.evidence, ...evidence])).sort(compareIdentifiers);
      return;
    }
    this.edges.set(id, {
      id,
      type,
      source,
      target,
      evidence: Array.from(new Set(evidence)).sort(compareIdentifiers),
    });
  }

  build(): KnowledgeGraph {
    return {
      nodes: Array.from(this.nodes.values()).sort((a, b) => compareIdentifiers(a.id, b.id)),
      edges: Array.from(this.edges.values()).sort((a, b) => compareIdentifiers(a.id, b.id)),
    };
  }
}

/**
 * Build the graph. Every edge comes from a source record, the patient
 * context or a finding; nothing is inferred beyond them.
 */
export function projectKnowledgeGraph(
  records: ReadonlyArray<MedicationRecord>,
  context: PatientContext,
  findings: ReadonlyArray<Finding>,
): KnowledgeGraph {
  const graph = new GraphBuilder();
  const patientKey = context.patientId ?? 'patient';
  const patient = graph.node('patient', patientKey, context.patientId ?? 'Patient');

  const medication = (drug: string) => graph.node('medication', drug, drug);
  const condition = (name: string) => graph.node('condition', normalizeTerm(name), name);
  const allergy = (name: string) => graph.node('allergy', normalizeTerm(name), name);

  for (const record of records) {
    const drug = normalizeDrugIdentity(record.drugGenericName);
    const drugNode = medication(drug);
    graph.edge('takes', patient, drugNode, [record.sourcePrescriptionId]);

    for (const diagnosis of record.diagnoses ?? []) {
      graph.edge('prescribed_for', drugNode, condition(diagnosis), [record.sourcePrescriptionId]);
    }
    for (const symptom of record.symptoms ?? []) {
      const symptomNode = graph.node('symptom', normalizeTerm(symptom), symptom);
      graph.edge('prescribed_for', drugNode, symptomNode, [record.sourcePrescriptionId]);
    }
  }

  for (const name of context.chronicConditions) {
    graph.edge('has_condition', patient, condition(name), []);
  }
  for (const entry of context.allergies) {
    const substance = typeof entry === 'string' ? entry : entry.substance;
    graph.edge('has_allergy', patient, allergy(substance), []);
  }

  for (const finding of findings) {
    switch (finding.kind) {
      case 'drug_drug_interaction':
      case 'drug_class_interaction':
        graph.edge('interacts_with', medication(finding.drugs[0]), medication(finding.drugs[1]), [finding.id]);
        break;
      case 'duplicate_therapy':
        for (let i = 0; i < finding.drugs.length; i++) {
          for (let j = i + 1; j < finding.drugs.length; j++) {
            graph.edge('duplicates', medication(finding.drugs[i]), medication(finding.drugs[j]), [finding.id]);
          }
        }
        break;
      case 'contraindication':
        graph.edge('contraindicated_by', medication(finding.drug), condition(finding.condition), [finding.id]);
        break;
      case 'allergy_conflict':
        graph.edge('allergic_to', medication(finding.drug), allergy(finding.allergen), [finding.id]);
        break;
      default: {
        const unreachable: never = finding;
        throw new Error(`Unhandled finding: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  return graph.build();
}

export function graphStatistics(graph: KnowledgeGraph): GraphStatistics {
  const nodesByType: Record<GraphNodeType, number> = {
    patient: 0,
    medication: 0,
    condition: 0,
    allergy: 0,
    symptom: 0,
  };
  const edgesByType: Record<GraphEdgeType, number> = {
    takes: 0,
    has_condition: 0,
    has_allergy: 0,
    prescribed_for: 0,
    interacts_with: 0,
    duplicates: 0,
    contraindicated_by: 0,
    allergic_to: 0,
  };

  graph.nodes.forEach((node) => {
    nodesByType[node.type] += 1;
  });
  graph.edges.forEach((edge) => {
    edgesByType[edge.type] += 1;
  });

  return { nodeCount: graph.nodes.length, edgeCount: graph.edges.length, nodesByType, edgesByType };
}

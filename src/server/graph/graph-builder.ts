import {
  diseaseRef,
  drugRef,
  geneRef,
  makeNodeKey,
} from "../../lib/graph.js";
import type { EntityStore } from "../entity/entity-store.js";
import { logEvent } from "../telemetry.js";
import { GraphDraft, type KnowledgeGraph } from "./knowledge-graph.js";

/**
 * Builds the drug / disease / gene graph from a fully loaded entity store.
 *
 * Edges that reference a missing node are skipped. After the direct edges, each drug
 * links every disease it treats to every gene it targets with a weak propagated
 * edge, unless the pair is already connected; the first drug to connect a pair is
 * kept as the mediator.
 */
export function buildKnowledgeGraph(entities: EntityStore): KnowledgeGraph {
  const draft = new GraphDraft();
  let skippedEdges = 0;

  for (const drug of entities.allDrugs()) {
    draft.addDrug(drugRef(drug.drugId), {
      name: drug.drugName,
      atc: drug.atc,
      indications: drug.indicationsText,
    });
  }

  for (const disease of entities.allDiseases()) {
    draft.addDisease(diseaseRef(disease.diseaseId), {
      name: disease.diseaseName,
      synonyms: disease.synonyms,
    });
  }

  for (const association of entities.allGeneAssociations()) {
    draft.addGene(geneRef(association.geneSymbol));
  }

  for (const row of entities.allEvidence()) {
    const added = draft.setEdge(
      makeNodeKey(drugRef(row.drugId)),
      makeNodeKey(diseaseRef(row.diseaseId)),
      { type: "drug_disease", evidence: row.evidence },
    );
    if (!added) skippedEdges += 1;
  }

  for (const row of entities.allGeneAssociations()) {
    const added = draft.setEdge(
      makeNodeKey(drugRef(row.drugId)),
      makeNodeKey(geneRef(row.geneSymbol)),
      { type: "drug_gene", note: row.note },
    );
    if (!added) skippedEdges += 1;
  }

  const propagatedEdges = propagateDiseaseGeneEdges(draft);
  const graph = draft.freeze();

  logEvent("info", "graph.built", {
    totalNodes: graph.nodeCount,
    totalEdges: graph.edgeCount,
    propagatedEdges,
    skippedEdges,
  });

  return graph;
}

function propagateDiseaseGeneEdges(draft: GraphDraft): number {
  let added = 0;
  for (const drugNode of draft.nodesOfKind("drug")) {
    const diseaseKeys = draft.neighborsOfKind(drugNode.key, "disease");
    const geneKeys = draft.neighborsOfKind(drugNode.key, "gene");

    for (const diseaseKey of diseaseKeys) {
      for (const geneKey of geneKeys) {
        if (draft.hasEdge(diseaseKey, geneKey)) continue;
        draft.setEdge(diseaseKey, geneKey, {
          type: "disease_gene_propagated",
          viaDrug: drugNode.ref,
        });
        added += 1;
      }
    }
  }
  return added;
}

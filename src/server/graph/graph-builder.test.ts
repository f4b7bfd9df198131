import { describe, it } from "node:test";
import assert from "node:assert";
import { InMemoryEntityStore } from "../entity/entity-store.js";
import { sampleEntityStore, sampleSnapshot } from "../testing/fixtures.js";
import { buildKnowledgeGraph } from "./graph-builder.js";

describe("buildKnowledgeGraph", () => {
  it("should add one node per drug, disease and distinct gene", () => {
    const graph = buildKnowledgeGraph(sampleEntityStore());
    const stats = graph.stats();

    assert.strictEqual(stats.drugNodes, 3);
    assert.strictEqual(stats.diseaseNodes, 2);
    assert.strictEqual(stats.geneNodes, 1);
    assert.strictEqual(stats.totalEdges, 5);
  });

  it("should annotate direct edges with evidence and notes", () => {
    const graph = buildKnowledgeGraph(sampleEntityStore());

    const treats = graph.edgeBetween("drug:D2", "dis:Dis1");
    assert.deepStrictEqual(
      treats?.type === "drug_disease" ? [treats.evidence, treats.weight] : null,
      ["approved", 2],
    );
    const targets = graph.edgeBetween("gene:G1", "drug:D1");
    assert.deepStrictEqual(
      targets?.type === "drug_gene" ? [targets.note, targets.weight] : null,
      ["inhibitor", 1],
    );
  });

  it("should propagate disease-gene edges through a drug that links both", () => {
    const graph = buildKnowledgeGraph(sampleEntityStore());
    const edge = graph.edgeBetween("dis:Dis1", "gene:G1");

    assert.strictEqual(edge?.type, "disease_gene_propagated");
    assert.deepStrictEqual(
      edge?.type === "disease_gene_propagated" ? edge.viaDrug : null,
      { kind: "drug", id: "D2" },
    );
    assert.strictEqual(edge?.weight, 0.5);
  });

  it("should keep the first mediating drug when several connect the same pair", () => {
    const snapshot = sampleSnapshot();
    snapshot.drugs.push({ drugId: "D4", drugName: "Later", atc: "", indicationsText: "" });
    snapshot.evidence.push({ drugId: "D4", diseaseId: "Dis1", evidence: "trial" });
    snapshot.geneAssociations.push({ drugId: "D4", geneSymbol: "G1", note: "binder" });

    const graph = buildKnowledgeGraph(new InMemoryEntityStore(snapshot));
    const edge = graph.edgeBetween("dis:Dis1", "gene:G1");
    assert.deepStrictEqual(
      edge?.type === "disease_gene_propagated" ? edge.viaDrug.id : null,
      "D2",
    );
  });

  it("should skip rows that reference unknown entities", () => {
    const snapshot = sampleSnapshot();
    snapshot.evidence.push({ drugId: "GHOST", diseaseId: "Dis1", evidence: "approved" });
    snapshot.evidence.push({ drugId: "D1", diseaseId: "GHOST", evidence: "approved" });

    const graph = buildKnowledgeGraph(new InMemoryEntityStore(snapshot));
    assert.strictEqual(graph.hasNode("drug:GHOST"), false);
    assert.strictEqual(graph.edgeCount, 5);
  });

  it("should let the last duplicate row win", () => {
    const snapshot = sampleSnapshot();
    snapshot.evidence.push({ drugId: "D2", diseaseId: "Dis1", evidence: "Withdrawn" });

    const graph = buildKnowledgeGraph(new InMemoryEntityStore(snapshot));
    const edge = graph.edgeBetween("drug:D2", "dis:Dis1");
    assert.strictEqual(edge?.type === "drug_disease" ? edge.evidence : null, "withdrawn");
    assert.strictEqual(graph.edgeCount, 5);
  });

  it("should produce identical counts when rebuilt from the same entities", () => {
    const store = sampleEntityStore();
    const first = buildKnowledgeGraph(store);
    const second = buildKnowledgeGraph(store);

    assert.notStrictEqual(first, second);
    assert.deepStrictEqual(second.stats(), first.stats());
  });
});

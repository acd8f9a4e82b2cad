import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "../src/core/errors.js";
import { LocalDocumentStore, chunkMarkdown } from "../src/core/retrieval/local-store.js";

const PAYMENTS_CHUNK =
  "# Payments API\n\nThe payments service exposes a REST API only.\n\nFraud scoring is out of scope for this release.";
const LEDGER_CHUNK = "# Ledger\n\nThe ledger records every settled payment.";

const DOCS: Record<string, string> = {
  "payments.md": `---
id: payments-rest
project: payments
title: Payments API
status: approved
approvedAt: 2026-03-01
modules: [src/payments]
links: [ledger-core]
---
${PAYMENTS_CHUNK}
`,
  "nested/ledger.md": `---
id: ledger-core
project: payments
approvedAt: "2026-05-10"
modules: [src/ledger]
---
${LEDGER_CHUNK}
`,
  "grpc-draft.md": `---
id: payments-grpc
project: payments
status: draft
modules: [src/payments]
---
gRPC transport proposal.
`,
  "billing.md": `---
id: billing-x
project: billing
approvedAt: 2026-06-01
modules: [src/payments]
---
Billing owns invoices.
`
};

let docsDir = "";

function writeDocs(files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    const path = join(docsDir, name);
    mkdirSync(join(path, ".."), { recursive: true });
    writeFileSync(path, content);
  }
}

beforeEach(() => {
  docsDir = mkdtempSync(join(tmpdir(), "scope-sentinel-docs-"));
});

afterEach(() => {
  rmSync(docsDir, { recursive: true, force: true });
});

describe("chunkMarkdown", () => {
  it("packs paragraphs up to the limit and opens a chunk at each heading", () => {
    expect(chunkMarkdown("para one\n\npara two\n\n# Head\n\nbody", 100)).toEqual(["para one\n\npara two", "# Head\n\nbody"]);
  });

  it("splits paragraphs that do not fit together", () => {
    expect(chunkMarkdown("para one\n\npara two\n\n# Head\n\nbody", 3)).toEqual(["para one", "para two", "# Head", "body"]);
  });
});

describe("LocalDocumentStore", () => {
  it("orders approved documents of the project by approval date", async () => {
    writeDocs(DOCS);
    const store = new LocalDocumentStore({ docsDir, chunkTokenLimit: 256 });

    expect(await store.relationalFilter({ projectId: "payments", limit: 5 })).toEqual([
      { docId: "ledger-core", text: LEDGER_CHUNK, rank: 0 },
      { docId: "payments-rest", text: PAYMENTS_CHUNK, rank: 1 }
    ]);
    expect(await store.relationalFilter({ projectId: "payments", limit: 1 })).toHaveLength(1);
  });

  it("walks from changed modules through document links", async () => {
    writeDocs(DOCS);
    const store = new LocalDocumentStore({ docsDir, chunkTokenLimit: 256 });
    const anchors = ["src/payments/fraud.py", "src", "src/payments", "fraud"];

    expect(await store.graphTraverse({ projectId: "payments", anchors, maxHops: 2 })).toEqual([
      { docId: "payments-rest", text: PAYMENTS_CHUNK, distance: 1 },
      { docId: "ledger-core", text: LEDGER_CHUNK, distance: 2 }
    ]);
    expect(await store.graphTraverse({ projectId: "payments", anchors, maxHops: 1 })).toEqual([
      { docId: "payments-rest", text: PAYMENTS_CHUNK, distance: 1 }
    ]);
  });

  it("scores chunks by term overlap and skips unrelated ones", async () => {
    writeDocs(DOCS);
    const store = new LocalDocumentStore({ docsDir, chunkTokenLimit: 256 });

    const hits = await store.vectorSearch({ projectId: "payments", text: "fraud scoring REST", topK: 5 });
    expect(hits.map((hit) => hit.docId)).toEqual(["payments-rest"]);
    expect(hits[0]?.score).toBeGreaterThan(0);
  });

  it("returns nothing for a project without documents", async () => {
    writeDocs(DOCS);
    const store = new LocalDocumentStore({ docsDir, chunkTokenLimit: 256 });
    expect(await store.relationalFilter({ projectId: "unknown", limit: 5 })).toEqual([]);
    expect(await store.vectorSearch({ projectId: "unknown", text: "fraud", topK: 5 })).toEqual([]);
  });

  it("treats a missing docs directory as an empty corpus", async () => {
    const store = new LocalDocumentStore({ docsDir: join(docsDir, "missing"), chunkTokenLimit: 256 });
    expect(await store.graphTraverse({ projectId: "payments", anchors: ["src"], maxHops: 2 })).toEqual([]);
  });

  it("rejects documents without front matter", async () => {
    writeDocs({ "loose.md": "# Notes\n\nNo metadata here.\n" });
    const store = new LocalDocumentStore({ docsDir, chunkTokenLimit: 256 });
    await expect(store.relationalFilter({ projectId: "payments", limit: 5 })).rejects.toThrow(ConfigError);
  });

  it("rejects duplicate document ids", async () => {
    writeDocs({
      "a.md": "---\nid: same\nproject: payments\n---\nA\n",
      "b.md": "---\nid: same\nproject: payments\n---\nB\n"
    });
    const store = new LocalDocumentStore({ docsDir, chunkTokenLimit: 256 });
    await expect(store.relationalFilter({ projectId: "payments", limit: 5 })).rejects.toThrow(
      'Design document id "same" is used by both a.md and b.md.'
    );
  });
});

import { readFile, readdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, relative } from "node:path";

import { parse } from "yaml";
import { z } from "zod";

import { ConfigError } from "../errors.js";
import { compareStrings } from "../text.js";
import { estimateTokens } from "../token-budget.js";
import type {
  DocumentStore,
  GraphHit,
  GraphQuery,
  RelationalHit,
  RelationalQuery,
  VectorHit,
  VectorQuery
} from "./contracts.js";
import { cosineSimilarity, termVector } from "./lexical.js";
import type { TermVector } from "./lexical.js";

const FRONT_MATTER_PATTERN = /^---\r?\n([\s\S]*?)\r?\n---\r?\n?/;

const frontMatterSchema = z.object({
  id: z.string().min(1),
  project: z.string().min(1),
  title: z.string().optional(),
  status: z.enum(["approved", "draft", "superseded"]).default("approved"),
  approvedAt: z
    .union([z.string(), z.date()])
    .transform((value) => (value instanceof Date ? value.toISOString().slice(0, 10) : value))
    .optional(),
  modules: z.array(z.string().min(1)).default([]),
  links: z.array(z.string().min(1)).default([])
});

export type DesignDocumentMeta = z.infer<typeof frontMatterSchema>;

export interface DesignDocument extends DesignDocumentMeta {
  file: string;
  chunks: Array<{ text: string; terms: TermVector }>;
}

export interface LocalDocumentStoreOptions {
  docsDir: string;
  chunkTokenLimit: number;
}

/** Splits a Markdown body on blank lines and packs paragraphs up to the token limit; headings open a new chunk. */
export function chunkMarkdown(body: string, chunkTokenLimit: number): string[] {
  const blocks = body
    .split(/\r?\n\s*\r?\n/)
    .map((block) => block.trim())
    .filter(Boolean);

  const chunks: string[] = [];
  let current = "";
  for (const block of blocks) {
    const candidate = current ? `${current}\n\n${block}` : block;
    if (current && (block.startsWith("#") || estimateTokens(candidate) > chunkTokenLimit)) {
      chunks.push(current);
      current = block;
      continue;
    }
    current = candidate;
  }
  if (current) chunks.push(current);
  return chunks;
}

export function parseDesignDocument(raw: string, file: string, chunkTokenLimit: number): DesignDocument {
  const match = FRONT_MATTER_PATTERN.exec(raw);
  if (!match) {
    throw new ConfigError(`Design document ${file} has no YAML front matter.`);
  }

  let meta: unknown;
  try {
    meta = parse(match[1] ?? "");
  } catch (error) {
    throw new ConfigError(`Design document ${file} has invalid YAML front matter.`, { cause: error });
  }

  const validated = frontMatterSchema.safeParse(meta);
  if (!validated.success) {
    const issues = validated.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Design document ${file} has invalid front matter: ${issues.join("; ")}`, {
      details: { file, issues }
    });
  }

  const body = raw.slice(match[0].length);
  const chunks = chunkMarkdown(body, chunkTokenLimit).map((text) => ({ text, terms: termVector(text) }));
  return { ...validated.data, file, chunks };
}

async function findMarkdownFiles(root: string): Promise<string[]> {
  const results: string[] = [];

  async function walk(currentPath: string): Promise<void> {
    const entries = await readdir(currentPath, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(currentPath, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith(".")) continue;
        await walk(fullPath);
        continue;
      }
      if (entry.isFile() && entry.name.toLowerCase().endsWith(".md")) {
        results.push(fullPath);
      }
    }
  }

  await walk(root);
  return results.sort();
}

function moduleMatchesAnchor(module: string, anchor: string): boolean {
  const normalized = module.replace(/^\.\//, "").replace(/\/+$/, "");
  if (!normalized) return false;
  if (anchor === normalized || anchor.startsWith(`${normalized}/`)) return true;
  return !normalized.includes("/") && anchor.split("/").includes(normalized);
}

/**
 * Design documents on disk: Markdown files with YAML front matter (`id`, `project`, `status`,
 * `approvedAt`, `modules`, `links`). Only approved documents of the queried project are visible.
 */
export class LocalDocumentStore implements DocumentStore {
  private readonly options: LocalDocumentStoreOptions;
  private loading: Promise<DesignDocument[]> | undefined;

  constructor(options: LocalDocumentStoreOptions) {
    this.options = options;
  }

  private documents(): Promise<DesignDocument[]> {
    this.loading ??= this.load();
    return this.loading;
  }

  private async load(): Promise<DesignDocument[]> {
    const { docsDir, chunkTokenLimit } = this.options;
    if (!existsSync(docsDir)) return [];

    const files = await findMarkdownFiles(docsDir);
    const documents: DesignDocument[] = [];
    const seen = new Map<string, string>();
    for (const file of files) {
      const label = relative(docsDir, file);
      const document = parseDesignDocument(await readFile(file, "utf8"), label, chunkTokenLimit);
      const previous = seen.get(document.id);
      if (previous) {
        throw new ConfigError(`Design document id "${document.id}" is used by both ${previous} and ${label}.`);
      }
      seen.set(document.id, label);
      documents.push(document);
    }
    return documents;
  }

  private async approvedFor(projectId: string): Promise<DesignDocument[]> {
    const documents = await this.documents();
    return documents.filter((document) => document.project === projectId && document.status === "approved");
  }

  async vectorSearch(query: VectorQuery): Promise<VectorHit[]> {
    const queryTerms = termVector(query.text);
    const hits: VectorHit[] = [];
    for (const document of await this.approvedFor(query.projectId)) {
      for (const chunk of document.chunks) {
        const score = cosineSimilarity(queryTerms, chunk.terms);
        if (score > 0) hits.push({ docId: document.id, text: chunk.text, score });
      }
    }
    return hits
      .sort((a, b) => b.score - a.score || compareStrings(a.docId, b.docId) || compareStrings(a.text, b.text))
      .slice(0, Math.max(0, query.topK));
  }

  /** Modules touched by the anchors sit at hop 0, the documents that own them at hop 1, linked documents beyond. */
  async graphTraverse(query: GraphQuery): Promise<GraphHit[]> {
    const documents = await this.approvedFor(query.projectId);
    const byId = new Map(documents.map((document) => [document.id, document]));

    const neighbours = new Map<string, Set<string>>();
    const connect = (from: string, to: string): void => {
      const set = neighbours.get(from) ?? new Set<string>();
      set.add(to);
      neighbours.set(from, set);
    };
    for (const document of documents) {
      for (const link of document.links) {
        if (!byId.has(link)) continue;
        connect(document.id, link);
        connect(link, document.id);
      }
    }

    const distances = new Map<string, number>();
    let frontier = documents
      .filter((document) => document.modules.some((module) => query.anchors.some((anchor) => moduleMatchesAnchor(module, anchor))))
      .map((document) => document.id);
    for (const id of frontier) distances.set(id, 1);

    for (let hop = 2; hop <= query.maxHops && frontier.length > 0; hop += 1) {
      const next: string[] = [];
      for (const id of frontier) {
        for (const neighbour of neighbours.get(id) ?? []) {
          if (distances.has(neighbour)) continue;
          distances.set(neighbour, hop);
          next.push(neighbour);
        }
      }
      frontier = next;
    }

    const hits: GraphHit[] = [];
    for (const [id, distance] of distances) {
      if (distance > query.maxHops) continue;
      const document = byId.get(id);
      if (!document) continue;
      for (const chunk of document.chunks) {
        hits.push({ docId: id, text: chunk.text, distance });
      }
    }
    return hits;
  }

  async relationalFilter(query: RelationalQuery): Promise<RelationalHit[]> {
    const ordered = (await this.approvedFor(query.projectId)).sort(
      (a, b) => compareStrings(b.approvedAt ?? "", a.approvedAt ?? "") || compareStrings(a.id, b.id)
    );
    return ordered.slice(0, Math.max(0, query.limit)).flatMap((document, rank) =>
      document.chunks.map((chunk) => ({ docId: document.id, text: chunk.text, rank }))
    );
  }
}

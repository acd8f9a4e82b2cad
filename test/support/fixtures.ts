import type { InvocationRequest, InvocationResult, ModelInvoker } from "../../src/core/ai/contracts.js";
import { freezeChangeSet } from "../../src/core/diff/contracts.js";
import type { ChangeSet, FileChange } from "../../src/core/types.js";

export function paymentsChangeSet(): ChangeSet {
  const files: FileChange[] = [
    {
      path: "src/payments/fraud.py",
      changeKind: "added",
      hunks: [{ startLine: 1, endLine: 3, text: "+def score(txn):\n+    return model.predict(txn)\n+" }]
    },
    {
      path: "src/payments/grpc.py",
      changeKind: "modified",
      hunks: [{ startLine: 10, endLine: 11, text: " import grpc\n-server = None\n+server = grpc.server()" }]
    }
  ];
  return freezeChangeSet({
    repoRef: "/repo",
    base: "main",
    head: "feature/fraud",
    files,
    metadata: { title: "Add fraud scoring over gRPC", commitSubjects: ["Add fraud scoring over gRPC"] }
  });
}

/** Replays canned model responses in order and records every request. */
export class ScriptedInvoker implements ModelInvoker {
  readonly label = "scripted";
  readonly requests: InvocationRequest[] = [];
  private readonly responses: InvocationResult[];

  constructor(responses: InvocationResult[]) {
    this.responses = [...responses];
  }

  async invoke(request: InvocationRequest): Promise<InvocationResult> {
    this.requests.push(request);
    const next = this.responses.shift();
    if (!next) throw new Error("ScriptedInvoker ran out of responses");
    return next;
  }
}

export function textResponse(value: unknown): InvocationResult {
  return { ok: true, text: typeof value === "string" ? value : JSON.stringify(value) };
}

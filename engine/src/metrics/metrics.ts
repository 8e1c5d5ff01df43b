import client from "prom-client";

client.collectDefaultMetrics();

export const caseOpenedCounter = new client.Counter({
  name: "case_opened_total",
  help: "Number of cases opened.",
  labelNames: ["playbook_id"] as const
});

export const runStatusCounter = new client.Counter({
  name: "playbook_run_status_total",
  help: "Number of playbook runs reaching a summarized status.",
  labelNames: ["status"] as const
});

export const taskStatusCounter = new client.Counter({
  name: "task_status_total",
  help: "Number of task status transitions.",
  labelNames: ["status"] as const
});

export const dispatchLatencyHistogram = new client.Histogram({
  name: "task_dispatch_latency_seconds",
  help: "Time spent in a task handler.",
  labelNames: ["task_type"] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30]
});

export const ledgerAnchorCounter = new client.Counter({
  name: "ledger_anchor_total",
  help: "Number of ledger anchors written."
});

export async function metricsSnapshot(): Promise<string> {
  return client.register.metrics();
}

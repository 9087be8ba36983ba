import { isMap, isNode, isScalar, isSeq, LineCounter, parseDocument, type Pair, type YAMLMap } from "yaml";

import type { Finding, FindingSeverity } from "../types.js";

/** Outcome of validating one workflow document. */
export interface WorkflowValidation {
  /** Structural violations, in document order. */
  readonly findings: Finding[];
  /** Set when the text is not YAML at all; {@link findings} is then empty. */
  readonly syntaxError: Finding | null;
}

/** Collects findings with their position in the source text. */
class FindingCollector {
  readonly findings: Finding[] = [];

  constructor(
    private readonly lineCounter: LineCounter,
    private readonly file: string | undefined,
  ) {}

  add(rule: string, message: string, node: unknown, severity: FindingSeverity = "error"): void {
    const finding: Finding = { severity, message, rule };
    if (this.file !== undefined) {
      finding.file = this.file;
    }
    if (isNode(node) && node.range) {
      const position = this.lineCounter.linePos(node.range[0]);
      finding.line = position.line;
      finding.column = position.col;
    }
    this.findings.push(finding);
  }
}

function findPair(map: YAMLMap, key: string): Pair | undefined {
  return map.items.find((pair) => isScalar(pair.key) && pair.key.value === key);
}

function keyName(pair: Pair): string {
  return isScalar(pair.key) ? String(pair.key.value) : String(pair.key);
}

function isSelfHosted(runsOn: unknown): boolean {
  if (isScalar(runsOn)) {
    return runsOn.value === "self-hosted";
  }
  if (isSeq(runsOn)) {
    return runsOn.items.some((item) => isScalar(item) && item.value === "self-hosted");
  }
  return false;
}

function validateSteps(jobId: string, stepsPair: Pair, collector: FindingCollector): void {
  const steps = stepsPair.value;
  if (!isSeq(steps)) {
    collector.add("steps-not-list", `job "${jobId}": "steps" must be a list`, steps ?? stepsPair.key);
    return;
  }
  if (steps.items.length === 0) {
    collector.add("missing-steps", `job "${jobId}" has no steps`, steps);
    return;
  }
  steps.items.forEach((step, index) => {
    const label = `job "${jobId}" step ${index + 1}`;
    if (!isMap(step)) {
      collector.add("step-not-mapping", `${label} must be a mapping`, step);
      return;
    }
    const uses = findPair(step, "uses");
    const run = findPair(step, "run");
    if (!uses && !run) {
      collector.add("step-missing-action", `${label} needs "uses" or "run"`, step);
    } else if (uses && run) {
      collector.add("step-conflicting-action", `${label} cannot have both "uses" and "run"`, step);
    }
  });
}

function validateJob(jobPair: Pair, collector: FindingCollector): void {
  const jobId = keyName(jobPair);
  const job = jobPair.value;
  if (!isMap(job)) {
    collector.add("job-not-mapping", `job "${jobId}" must be a mapping`, job ?? jobPair.key);
    return;
  }

  // Jobs calling a reusable workflow have neither a runner nor steps.
  if (findPair(job, "uses")) {
    return;
  }

  const runsOn = findPair(job, "runs-on");
  if (!runsOn) {
    collector.add("missing-runs-on", `job "${jobId}" is missing "runs-on"`, jobPair.key);
  }

  const container = findPair(job, "container");
  if (container && isMap(container.value) && !findPair(container.value, "image")) {
    collector.add("container-missing-image", `job "${jobId}": "container" needs an "image"`, container.value);
  }

  const steps = findPair(job, "steps");
  if (!steps) {
    collector.add("missing-steps", `job "${jobId}" has no steps`, jobPair.key);
  } else {
    validateSteps(jobId, steps, collector);
  }

  if (runsOn && isSelfHosted(runsOn.value) && !container) {
    collector.add(
      "self-hosted-without-container",
      `job "${jobId}" runs on a self-hosted runner without a container`,
      runsOn.value,
      "warning",
    );
  }
}

/**
 * Parses {@link text} as a CI workflow definition and checks its structure.
 * Every violation is reported, not only the first one.
 */
export function validateWorkflowText(text: string, file?: string): WorkflowValidation {
  const lineCounter = new LineCounter();
  const document = parseDocument(text, { lineCounter });

  const [firstError] = document.errors;
  if (firstError) {
    const syntaxError: Finding = {
      severity: "error",
      message: `YAML syntax error: ${(firstError.message.split("\n")[0] ?? firstError.code).replace(/:$/, "")}`,
      rule: "yaml-syntax",
    };
    if (file !== undefined) {
      syntaxError.file = file;
    }
    const position = firstError.linePos?.[0];
    if (position) {
      syntaxError.line = position.line;
      syntaxError.column = position.col;
    }
    return { findings: [], syntaxError };
  }

  const collector = new FindingCollector(lineCounter, file);
  const root = document.contents;
  if (!isMap(root)) {
    collector.add("not-a-mapping", "workflow must be a mapping at the top level", root);
    return { findings: collector.findings, syntaxError: null };
  }

  if (!findPair(root, "on")) {
    collector.add("missing-on", 'missing required top-level key "on"', root);
  }

  const jobsPair = findPair(root, "jobs");
  if (!jobsPair) {
    collector.add("missing-jobs", 'missing required top-level key "jobs"', root);
    return { findings: collector.findings, syntaxError: null };
  }

  const jobs = jobsPair.value;
  if (!isMap(jobs)) {
    collector.add("jobs-not-mapping", '"jobs" must be a mapping of job ids to jobs', jobs ?? jobsPair.key);
    return { findings: collector.findings, syntaxError: null };
  }
  if (jobs.items.length === 0) {
    collector.add("missing-steps", '"jobs" defines no job with steps', jobs);
    return { findings: collector.findings, syntaxError: null };
  }

  for (const jobPair of jobs.items) {
    validateJob(jobPair, collector);
  }
  return { findings: collector.findings, syntaxError: null };
}

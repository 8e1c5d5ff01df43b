import type { CaseRecord, JsonObject, TaskRecord } from "@incident/shared";

export type PolicyStage = "before" | "after";

export interface TaskPolicyContext {
  inputs: JsonObject;
  /** Only present for `after` rules: the output the handler produced. */
  output?: JsonObject;
}

export interface CasePolicyRule {
  name: string;
  predicate: (caseRecord: Readonly<CaseRecord>) => boolean;
  message: string;
}

export interface TaskPolicyRule {
  name: string;
  stage?: PolicyStage;
  predicate: (caseRecord: Readonly<CaseRecord>, task: Readonly<TaskRecord>, context: TaskPolicyContext) => boolean;
  message: string;
}

export class PolicyViolation extends Error {
  constructor(
    readonly rule: string,
    readonly reason: string
  ) {
    super(`${rule}: ${reason}`);
    this.name = "PolicyViolation";
  }
}

export class PolicyGate {
  private readonly caseRules: CasePolicyRule[] = [];
  private readonly taskRules: TaskPolicyRule[] = [];

  registerCaseRule(rule: CasePolicyRule): this {
    this.caseRules.push(rule);
    return this;
  }

  registerTaskRule(rule: TaskPolicyRule): this {
    this.taskRules.push(rule);
    return this;
  }

  get ruleNames(): string[] {
    return [...this.caseRules, ...this.taskRules].map((rule) => rule.name);
  }

  evaluateCase(caseRecord: Readonly<CaseRecord>): void {
    for (const rule of this.caseRules) {
      if (!rule.predicate(caseRecord)) {
        throw new PolicyViolation(rule.name, rule.message);
      }
    }
  }

  evaluateTask(
    caseRecord: Readonly<CaseRecord>,
    task: Readonly<TaskRecord>,
    context: TaskPolicyContext,
    stage: PolicyStage = "before"
  ): void {
    for (const rule of this.taskRules) {
      if ((rule.stage ?? "before") !== stage) continue;
      if (!rule.predicate(caseRecord, task, context)) {
        throw new PolicyViolation(rule.name, rule.message);
      }
    }
  }

  static withDefaults(): PolicyGate {
    return new PolicyGate()
      .registerCaseRule({
        name: "case-title-present",
        predicate: (caseRecord) => caseRecord.title.trim().length > 0,
        message: "Case title is required."
      })
      .registerTaskRule({
        name: "outputs-after-approval",
        stage: "after",
        predicate: (_caseRecord, task, context) =>
          task.approvedBy === null || (context.output !== undefined && Object.keys(context.output).length > 0),
        message: "Approved tasks must emit outputs before completion."
      });
  }
}

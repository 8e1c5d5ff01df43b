import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { AnchorRecord } from "@incident/shared";
import type { CaseService } from "../caseService.js";

/** Periodically anchors the tip of every open case ledger. */
export class AnchorScheduler {
  private job: ScheduledTask | null = null;

  constructor(
    private readonly service: Pick<CaseService, "anchorAll">,
    private readonly schedule: string
  ) {}

  start(): void {
    if (!cron.validate(this.schedule)) {
      throw new Error(`Invalid anchor schedule '${this.schedule}'.`);
    }
    if (this.job) return;
    this.job = cron.schedule(this.schedule, () => {
      this.runOnce().catch((error) => {
        console.error("ledger anchoring failed", error);
      });
    });
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  async runOnce(): Promise<AnchorRecord[]> {
    const anchors = await this.service.anchorAll({ trigger: "schedule", schedule: this.schedule });
    console.log(`anchored ${anchors.length} ledger(s)`);
    return anchors;
  }
}

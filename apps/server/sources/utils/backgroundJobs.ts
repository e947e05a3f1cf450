import { log } from "@/utils/log";
import { backgroundJobsCounter } from "@/app/monitoring/metrics";

type Job = {
    name: string;
    run: () => Promise<void>;
};

export type BackgroundJobsOptions = {
    concurrency: number;
    maxPending: number;
};

/**
 * Fire-and-forget work with bounded concurrency and a bounded backlog.
 * Failures are logged and counted, never propagated to the dispatcher.
 */
export class BackgroundJobs {
    private readonly pending: Job[] = [];
    private active = 0;
    private idleWaiters: Array<() => void> = [];

    constructor(private readonly options: BackgroundJobsOptions) {}

    get activeCount(): number {
        return this.active;
    }

    get pendingCount(): number {
        return this.pending.length;
    }

    dispatch(name: string, run: () => Promise<void>): boolean {
        if (this.pending.length >= this.options.maxPending) {
            backgroundJobsCounter.inc({ job: name, result: "dropped" });
            log({ module: "background-jobs", level: "warn", job: name }, `Backlog full (${this.options.maxPending}), dropping job ${name}`);
            return false;
        }
        this.pending.push({ name, run });
        this.pump();
        return true;
    }

    /** Resolves once nothing is running or queued. */
    onIdle(): Promise<void> {
        if (this.active === 0 && this.pending.length === 0) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    private pump(): void {
        while (this.active < this.options.concurrency && this.pending.length > 0) {
            const [job] = this.pending.splice(0, 1);
            this.active++;
            void this.execute(job);
        }
        if (this.active === 0 && this.pending.length === 0 && this.idleWaiters.length > 0) {
            const waiters = this.idleWaiters;
            this.idleWaiters = [];
            for (const resolve of waiters) {
                resolve();
            }
        }
    }

    private async execute(job: Job): Promise<void> {
        try {
            await job.run();
            backgroundJobsCounter.inc({ job: job.name, result: "ok" });
        } catch (error) {
            backgroundJobsCounter.inc({ job: job.name, result: "failed" });
            log({ module: "background-jobs", level: "warn", job: job.name }, `Job ${job.name} failed:`, error);
        } finally {
            this.active--;
            this.pump();
        }
    }
}

// src/pipeline/approvals.ts

export type ApprovalDecision = 'approved' | 'rejected' | 'timeout';

interface PendingApproval {
  settle: (decision: ApprovalDecision) => void;
}

/**
 * Suspension point for runs waiting on a manual go-ahead, keyed by run id.
 * Only the waiting run blocks; approve/reject for a run that is not waiting
 * report false.
 */
export class ApprovalGate {
  private readonly pending = new Map<string, PendingApproval>();

  isWaiting(runId: string): boolean {
    return this.pending.has(runId);
  }

  wait(runId: string, timeoutMs?: number): Promise<ApprovalDecision> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const settle = (decision: ApprovalDecision) => {
        if (timer) clearTimeout(timer);
        this.pending.delete(runId);
        resolve(decision);
      };

      this.pending.set(runId, { settle });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => settle('timeout'), timeoutMs);
      }
    });
  }

  approve(runId: string): boolean {
    return this.signal(runId, 'approved');
  }

  reject(runId: string): boolean {
    return this.signal(runId, 'rejected');
  }

  private signal(runId: string, decision: ApprovalDecision): boolean {
    const entry = this.pending.get(runId);
    if (!entry) return false;
    entry.settle(decision);
    return true;
  }
}

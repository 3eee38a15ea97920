/**
 * 프로세스 단위 카운터 (재시작 시 초기화)
 * 전역 변수 대신 생성 후 Scheduler / Dispatcher에 주입합니다.
 */
export interface StatsSnapshot {
    startedAt: string;
    checksPerformed: number;
    checkFailures: number;
    commitsDetected: number;
    notificationsSent: number;
    deliveryFailures: number;
}

export class RuntimeStats {
    private readonly startedAt = new Date();
    private checksPerformed = 0;
    private checkFailures = 0;
    private commitsDetected = 0;
    private notificationsSent = 0;
    private deliveryFailures = 0;

    recordCheck(failed: boolean): void {
        this.checksPerformed++;
        if (failed) this.checkFailures++;
    }

    recordCommits(count: number): void {
        this.commitsDetected += count;
    }

    recordDelivery(succeeded: boolean): void {
        if (succeeded) this.notificationsSent++;
        else this.deliveryFailures++;
    }

    snapshot(): StatsSnapshot {
        return {
            startedAt: this.startedAt.toISOString(),
            checksPerformed: this.checksPerformed,
            checkFailures: this.checkFailures,
            commitsDetected: this.commitsDetected,
            notificationsSent: this.notificationsSent,
            deliveryFailures: this.deliveryFailures,
        };
    }
}

interface LockEntry<T> {
    inflight: Promise<T> | null;
}

export type LockOutcome<T> =
    | { acquired: true; promise: Promise<T> }
    /** 이미 실행 중: 진행 중인 작업의 promise를 공유 (대기열에 넣지 않음) */
    | { acquired: false; promise: Promise<T> };

/**
 * 키(레포지토리 id)별 상호 배제
 * 엔트리는 처음 사용할 때 생성되며 삭제하지 않습니다.
 */
export class KeyedLock<T> {
    private entries = new Map<string, LockEntry<T>>();

    private entryFor(key: string): LockEntry<T> {
        let entry = this.entries.get(key);
        if (!entry) {
            entry = { inflight: null };
            this.entries.set(key, entry);
        }
        return entry;
    }

    isHeld(key: string): boolean {
        return this.entries.get(key)?.inflight != null;
    }

    /**
     * 잠금을 얻으면 task를 실행하고, 이미 실행 중이면 기존 promise를 반환
     */
    tryRun(key: string, task: () => Promise<T>): LockOutcome<T> {
        const entry = this.entryFor(key);
        if (entry.inflight) {
            return { acquired: false, promise: entry.inflight };
        }

        const promise = Promise.resolve()
            .then(task)
            .finally(() => {
                entry.inflight = null;
            });
        entry.inflight = promise;
        return { acquired: true, promise };
    }

    /** 진행 중인 모든 작업 */
    pending(): Promise<T>[] {
        const result: Promise<T>[] = [];
        for (const entry of this.entries.values()) {
            if (entry.inflight) result.push(entry.inflight);
        }
        return result;
    }

    get size(): number {
        return this.entries.size;
    }
}

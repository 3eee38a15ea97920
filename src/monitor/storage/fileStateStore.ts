import fs from "fs";
import path from "path";
import { StorageError, errorMessage } from "../../shared/errors.js";
import { createRepositoryState } from "../../shared/models/Repository.js";
import { MemoryStateStore, emptySnapshot, type StateSnapshot } from "./memoryStateStore.js";

/**
 * JSON 파일 기반 상태 저장소
 * 구독 및 레포지토리별 마지막 알림 커밋을 추적하여 중복 알림을 방지합니다.
 */
export class FileStateStore extends MemoryStateStore {
    private stateFilePath: string;

    constructor(stateFilePath?: string) {
        const resolved = stateFilePath || path.join(process.cwd(), "commit-watch-state.json");
        super(FileStateStore.loadState(resolved));
        this.stateFilePath = resolved;
    }

    /**
     * 상태 파일 로드 (없으면 초기화)
     * 파일이 손상된 경우 기존 cursor를 잃지 않도록 시작을 중단합니다.
     */
    private static loadState(stateFilePath: string): StateSnapshot {
        if (!fs.existsSync(stateFilePath)) {
            return emptySnapshot();
        }

        try {
            const content = fs.readFileSync(stateFilePath, "utf-8");
            const parsed: unknown = JSON.parse(content);
            if (!isStateSnapshot(parsed)) {
                throw new Error("unexpected file structure");
            }
            console.log(`📄 Loaded ${Object.keys(parsed.repositories).length} repository states from ${stateFilePath}`);
            return withDefaults(parsed);
        } catch (error) {
            throw new StorageError(`Failed to load state file ${stateFilePath}: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * 임시 파일에 쓴 뒤 rename하여 부분 기록을 방지
     */
    protected override persist(next: StateSnapshot): void {
        const tmpPath = `${this.stateFilePath}.tmp`;
        try {
            fs.mkdirSync(path.dirname(this.stateFilePath), { recursive: true });
            fs.writeFileSync(tmpPath, JSON.stringify(next, null, 2), "utf-8");
            fs.renameSync(tmpPath, this.stateFilePath);
        } catch (error) {
            throw new StorageError(`Failed to write state file ${this.stateFilePath}: ${errorMessage(error)}`, { cause: error });
        }
    }

    override async healthCheck(): Promise<boolean> {
        try {
            fs.accessSync(path.dirname(this.stateFilePath), fs.constants.W_OK);
            return true;
        } catch {
            return false;
        }
    }
}

/**
 * baselineEstablished가 없는 이전 형식의 파일: cursor가 있으면 baseline이 기록된 것
 */
function withDefaults(snapshot: StateSnapshot): StateSnapshot {
    const repositories: StateSnapshot["repositories"] = {};
    for (const [id, state] of Object.entries(snapshot.repositories)) {
        repositories[id] = {
            ...createRepositoryState(id),
            ...state,
            baselineEstablished: state.baselineEstablished ?? Boolean(state.cursor),
        };
    }
    return { ...snapshot, repositories };
}

function isStateSnapshot(value: unknown): value is StateSnapshot {
    if (typeof value !== "object" || value === null) return false;
    return (
        "subscriptions" in value && Array.isArray(value.subscriptions) &&
        "repositories" in value && typeof value.repositories === "object" && value.repositories !== null
    );
}

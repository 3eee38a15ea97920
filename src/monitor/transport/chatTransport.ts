import type { Notification } from "../../shared/models/Notification.js";

/**
 * 채팅 전송 계층 (외부 협력자)
 * 메시지 포맷팅과 언어 선택은 전송 계층의 책임입니다.
 */
export interface ChatTransport {
    send(subscriberId: string, notification: Notification): Promise<void>;
}

/**
 * 로컬 실행용: 알림을 콘솔에 출력
 */
export class ConsoleChatTransport implements ChatTransport {
    async send(subscriberId: string, notification: Notification): Promise<void> {
        switch (notification.type) {
            case "commit":
                console.log(
                    `📨 [${subscriberId}] ${notification.repository} ${notification.commit.shortId} ` +
                    `${notification.commit.author}: ${notification.commit.message}`
                );
                break;
            case "commit_summary":
                console.log(
                    `📨 [${subscriberId}] ${notification.repository}: ${notification.totalCommits} new commits ` +
                    `(${notification.omittedCommits} not shown)`
                );
                break;
            case "history_rewritten":
                console.log(`📨 [${subscriberId}] ${notification.repository}: history rewritten, new tip ${notification.tip.shortId}`);
                break;
            case "repository_unreachable":
                console.log(`📨 [${subscriberId}] ${notification.repository} is unreachable: ${notification.reason}`);
                break;
            case "diagnostic":
                console.log(`📨 [${subscriberId}] (${notification.severity}) ${notification.message}`);
                break;
        }
    }
}

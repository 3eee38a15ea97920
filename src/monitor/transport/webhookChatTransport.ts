import fetch from "node-fetch";
import type { Notification } from "../../shared/models/Notification.js";
import type { ChatTransport } from "./chatTransport.js";

export interface WebhookChatTransportOptions {
    url: string;
    /** Bearer 토큰 (BOT_TOKEN) */
    token: string;
    timeoutMs?: number;
}

/**
 * 알림을 JSON으로 webhook에 POST
 * 실제 채팅 메시지 전송은 webhook을 받는 봇 프로세스가 담당합니다.
 */
export class WebhookChatTransport implements ChatTransport {
    constructor(private readonly options: WebhookChatTransportOptions) {}

    async send(subscriberId: string, notification: Notification): Promise<void> {
        const res = await fetch(this.options.url, {
            method: "POST",
            headers: {
                "Content-Type": "application/json",
                "User-Agent": "commit-watch",
                "Authorization": `Bearer ${this.options.token}`,
            },
            body: JSON.stringify({ chatId: subscriberId, notification }),
            signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
        });

        if (!res.ok) {
            throw new Error(`Transport webhook error: ${res.status} ${res.statusText}`);
        }
    }
}

/**
 * @fileoverview Slack Block Kit rendering
 *
 * Maps the engine's transport-neutral Notification onto a
 * chat.postMessage payload.
 *
 * @module governance-monitor/adapters/slack/blocks
 */

import type { Notification } from "@govwatch/engine";

export interface SlackText {
    readonly type: "plain_text" | "mrkdwn";
    readonly text: string;
    readonly emoji?: boolean;
}

export type SlackBlock =
    | { readonly type: "header"; readonly text: SlackText }
    | { readonly type: "section"; readonly text: SlackText }
    | {
        readonly type: "actions";
        readonly elements: readonly {
            readonly type: "button";
            readonly text: SlackText;
            readonly url: string;
        }[];
    };

export interface SlackMessage {
    readonly channel: string;
    readonly text: string;
    readonly blocks: readonly SlackBlock[];
    readonly unfurl_links: boolean;
    readonly unfurl_media: boolean;
    readonly thread_ts?: string;
    readonly reply_broadcast?: boolean;
}

/** Slack rejects header text longer than this */
const HEADER_MAX_LENGTH = 150;

function truncate(text: string, max: number): string {
    return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

/**
 * Render a notification. A non-null anchorHint makes the message a thread
 * reply that is also broadcast to the channel.
 *
 * @example
 * ```typescript
 * renderMessage("C0123", {
 *     title     : "Aave Offchain Proposal Ended",
 *     body      : "Raise the reserve factor",
 *     anchorHint: "1700000000.000100",
 * });
 * // { channel: "C0123", thread_ts: "1700000000.000100", reply_broadcast: true, ... }
 * ```
 */
export function renderMessage(
    channel: string,
    notification: Notification,
    options: { readonly unfurlLinks?: boolean } = {}
): SlackMessage {
    const blocks: SlackBlock[] = [
        {
            type: "header",
            text: { type: "plain_text", text: truncate(notification.title, HEADER_MAX_LENGTH), emoji: true },
        },
        {
            type: "section",
            text: { type: "mrkdwn", text: notification.body },
        },
    ];

    if (notification.actionLink) {
        blocks.push({
            type    : "actions",
            elements: [
                {
                    type: "button",
                    text: { type: "plain_text", text: notification.actionLink.label, emoji: true },
                    url : notification.actionLink.url,
                },
            ],
        });
    }

    const message: SlackMessage = {
        channel,
        text        : `${notification.title}\n${notification.body}`,
        blocks,
        unfurl_links: options.unfurlLinks ?? false,
        unfurl_media: false,
    };

    if (notification.anchorHint === null) {
        return message;
    }

    return { ...message, thread_ts: notification.anchorHint, reply_broadcast: true };
}

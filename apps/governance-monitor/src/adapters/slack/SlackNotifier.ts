/**
 * @fileoverview Slack notifier
 *
 * Posts notifications with chat.postMessage using a bot token. The message
 * `ts` returned by Slack is the thread anchor for follow-ups.
 *
 * Channels may be configured by id (`C0123ABCD`) or by name (`#alerts`);
 * names are resolved once through conversations.list and cached.
 *
 * A notification carrying a `route` goes to the channel mapped to that label
 * in `routes`, and to the default channel when the label is unmapped.
 *
 * @module governance-monitor/adapters/slack/SlackNotifier
 */

import { z } from "zod";
import {
    errorMessage,
    silentLogger,
    type EngineLogger,
    type Notification,
    type Notifier,
    type SendResult,
} from "@govwatch/engine";
import { parseResponse, requestJson, type FetchLike } from "../../http/jsonClient.js";
import { renderMessage } from "./blocks.js";

export interface SlackNotifierOptions {
    /** Bot token (xoxb-…) */
    readonly token: string;

    /** Channel id or `#name` */
    readonly channel: string;

    /** Channel id or `#name` by routing label */
    readonly routes?: Readonly<Record<string, string>>;

    /** Default: https://slack.com/api */
    readonly apiBaseUrl?: string;

    /** Let Slack unfurl links in the message (default: false) */
    readonly unfurlLinks?: boolean;

    readonly fetch?: FetchLike;
    readonly logger?: EngineLogger;
}

const PostMessageResponseSchema = z.object({
    ok   : z.boolean(),
    ts   : z.string().optional(),
    error: z.string().optional(),
});

const ConversationsListSchema = z.object({
    ok               : z.boolean(),
    error            : z.string().optional(),
    channels         : z.array(z.object({ id: z.string(), name: z.string() })).default([]),
    response_metadata: z.object({ next_cursor: z.string().optional() }).optional(),
});

export class SlackNotifier implements Notifier {
    readonly id = "slack";

    private readonly token: string;
    private readonly channel: string;
    private readonly routes: Readonly<Record<string, string>>;
    private readonly apiBaseUrl: string;
    private readonly unfurlLinks: boolean;
    private readonly fetchImpl: FetchLike;
    private readonly logger: EngineLogger;
    private readonly channelIds = new Map<string, string>();

    constructor(options: SlackNotifierOptions) {
        this.token = options.token;
        this.channel = options.channel;
        this.routes = options.routes ?? {};
        this.apiBaseUrl = (options.apiBaseUrl ?? "https://slack.com/api").replace(/\/+$/, "");
        this.unfurlLinks = options.unfurlLinks ?? false;
        this.fetchImpl = options.fetch ?? fetch;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Send a message. Transport errors, HTTP failures and `ok: false`
     * responses are all reported as `{ ok: false }`.
     */
    async send(notification: Notification, options: { readonly signal: AbortSignal }): Promise<SendResult> {
        try {
            const channel = await this.resolveChannel(this.destinationOf(notification), options.signal);
            const body = await requestJson(
                this.fetchImpl,
                `${this.apiBaseUrl}/chat.postMessage`,
                {
                    method : "POST",
                    headers: this.authHeaders(),
                    body   : renderMessage(channel, notification, { unfurlLinks: this.unfurlLinks }),
                    signal : options.signal,
                },
                "Slack chat.postMessage"
            );
            const result = parseResponse(PostMessageResponseSchema, body, "Slack chat.postMessage");

            if (!result.ok) {
                return { ok: false, anchor: null, error: result.error ?? "unknown_error" };
            }
            if (notification.anchorHint !== null) {
                this.logger.debug("Posted thread reply", { threadTs: notification.anchorHint, ts: result.ts });
            }
            return { ok: true, anchor: result.ts ?? null };
        }
        catch (error) {
            return { ok: false, anchor: null, error: errorMessage(error) };
        }
    }

    private authHeaders(): Record<string, string> {
        return { Authorization: `Bearer ${this.token}` };
    }

    private destinationOf(notification: Notification): string {
        if (notification.route === undefined) {
            return this.channel;
        }
        return Object.hasOwn(this.routes, notification.route) ? this.routes[notification.route] : this.channel;
    }

    private async resolveChannel(channel: string, signal: AbortSignal): Promise<string> {
        if (!channel.startsWith("#")) {
            return channel;
        }
        const cached = this.channelIds.get(channel);
        if (cached) {
            return cached;
        }

        const name = channel.slice(1);
        let cursor = "";
        do {
            const params = new URLSearchParams({
                types           : "public_channel,private_channel",
                exclude_archived: "true",
                limit           : "200",
            });
            if (cursor) {
                params.set("cursor", cursor);
            }

            const body = await requestJson(
                this.fetchImpl,
                `${this.apiBaseUrl}/conversations.list?${params.toString()}`,
                { headers: this.authHeaders(), signal },
                "Slack conversations.list"
            );
            const page = parseResponse(ConversationsListSchema, body, "Slack conversations.list");
            if (!page.ok) {
                throw new Error(`Slack conversations.list: ${page.error ?? "unknown_error"}`);
            }

            const match = page.channels.find((candidate) => candidate.name === name);
            if (match) {
                this.channelIds.set(channel, match.id);
                this.logger.info("Resolved Slack channel", { channel, id: match.id });
                return match.id;
            }
            cursor = page.response_metadata?.next_cursor ?? "";
        } while (cursor);

        throw new Error(`Slack channel not found: ${channel}`);
    }
}

// ---------------------------------------------------------------------------
// clanker-guard GroupMe client
// The actions the webhook takes against the group and its members
// ---------------------------------------------------------------------------

import crypto from "crypto";
import { isObject } from "./credential-store";
import { UpstreamError } from "./errors";

const BASE_URL = "https://api.groupme.com/v3";
const BOT_FOOTER = "\n [This action was performed automatically by a bot]";

export interface ModerationActions {
  /** Membership id of a user in the group, or null if they are not a member. */
  findMembership(userId: string): Promise<string | null>;
  removeMember(membershipId: string): Promise<void>;
  banMember(membershipId: string): Promise<void>;
  sendDm(userId: string, text: string): Promise<void>;
  postBotMessage(text: string): Promise<void>;
  likeMessage(messageId: string): Promise<void>;
}

export interface GroupMeOptions {
  accessToken: string;
  botId: string;
  groupId: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

export class GroupMeClient implements ModerationActions {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly group: string;

  constructor(private readonly options: GroupMeOptions) {
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.fetchImpl = options.fetch ?? fetch;
    this.group = encodeURIComponent(options.groupId);
  }

  async findMembership(userId: string): Promise<string | null> {
    const res = await this.call("GET", `/groups/${this.group}`);
    const data: unknown = await res.json();
    const response = isObject(data) ? data.response : undefined;
    const members = isObject(response) && Array.isArray(response.members) ? response.members : [];

    for (const member of members) {
      if (!isObject(member)) continue;
      if (String(member.user_id) === userId && member.id !== undefined && member.id !== null) {
        return String(member.id);
      }
    }
    return null;
  }

  async removeMember(membershipId: string): Promise<void> {
    await this.call("POST", `/groups/${this.group}/members/${encodeURIComponent(membershipId)}/remove`);
  }

  async banMember(membershipId: string): Promise<void> {
    await this.call("POST", `/groups/${this.group}/memberships/${encodeURIComponent(membershipId)}/destroy`);
  }

  async sendDm(userId: string, text: string): Promise<void> {
    await this.call("POST", "/direct_messages", {
      direct_message: {
        source_guid: crypto.randomUUID(),
        recipient_id: userId,
        text: text + BOT_FOOTER,
      },
    });
  }

  async postBotMessage(text: string): Promise<void> {
    await this.call("POST", "/bots/post", { bot_id: this.options.botId, text });
  }

  async likeMessage(messageId: string): Promise<void> {
    await this.call("POST", `/messages/${this.group}/${encodeURIComponent(messageId)}/like`, {
      like_icon: { type: "unicode", code: "❤️" },
    });
  }

  private async call(method: string, path: string, body?: Record<string, unknown>): Promise<Response> {
    const url = new URL(`${this.baseUrl}${path}`);
    url.searchParams.set("token", this.options.accessToken);

    const opts: RequestInit = { method, signal: AbortSignal.timeout(10_000) };
    if (body) {
      opts.body = JSON.stringify(body);
      opts.headers = { "Content-Type": "application/json" };
    }

    let res: Response;
    try {
      res = await this.fetchImpl(url.toString(), opts);
    } catch (err) {
      throw new UpstreamError(
        `GroupMe unreachable: ${err instanceof Error ? err.message : "request failed"}`
      );
    }
    if (!res.ok) {
      throw new UpstreamError(`GroupMe ${method} ${path} returned ${res.status}`);
    }
    return res;
  }
}

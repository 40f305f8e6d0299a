import { MappingError, type RecordKind } from "../errors.js";
import {
  instructionsSchema,
  tweetNodeSchema,
  userNodeSchema,
  type ItemContent,
  type MediaNode,
} from "./schemas.js";
import type { Media, Timeline, Tweet, User } from "./types.js";

export type { Media, MediaType, Timeline, Tweet, UrlEntity, User, UserMention } from "./types.js";

const UNAVAILABLE_TYPENAMES = new Set(["TweetTombstone", "TweetUnavailable", "UserUnavailable"]);

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

// e.g. "Wed Oct 10 20:19:24 +0000 2018"
const TWITTER_DATE = /^[A-Z][a-z]{2} ([A-Z][a-z]{2}) (\d{2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Walk a path of object keys, yielding undefined as soon as a step is missing */
export function valueAt(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** Null, missing, tombstoned or otherwise withheld result nodes */
export function isUnavailable(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (!isRecord(value)) return false;
  const typename = value.__typename;
  return typeof typename === "string" && UNAVAILABLE_TYPENAMES.has(typename);
}

export function parseTwitterDate(value: string | null): string | null {
  if (!value) return null;

  const match = TWITTER_DATE.exec(value);
  let time: number;
  if (match) {
    const [, monthName, day, hours, minutes, seconds, sign, offsetHours, offsetMinutes, year] = match;
    const month = MONTHS.indexOf(monthName);
    if (month < 0) return null;
    const iso = `${year}-${String(month + 1).padStart(2, "0")}-${day}T${hours}:${minutes}:${seconds}${sign}${offsetHours}:${offsetMinutes}`;
    time = Date.parse(iso);
  } else {
    time = Date.parse(value);
  }
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

function joinPath(base: string, suffix: string): string {
  return base ? `${base}.${suffix}` : suffix;
}

function present<T>(value: T | null): value is T {
  return value !== null;
}

// ─── User ───

export function mapUser(raw: unknown, path = ""): User {
  const parsed = userNodeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MappingError("user", path, "expected an object");
  }

  const node = parsed.data;
  if (!node.rest_id) {
    throw new MappingError("user", joinPath(path, "rest_id"), "missing id");
  }

  const legacy = node.legacy;
  return {
    id: node.rest_id,
    screenName: node.core?.screen_name ?? legacy?.screen_name ?? null,
    name: node.core?.name ?? legacy?.name ?? null,
    description: legacy?.description ?? null,
    location: node.location?.location ?? legacy?.location ?? null,
    avatarUrl: node.avatar?.image_url ?? legacy?.profile_image_url_https ?? null,
    url: legacy?.url ?? null,
    followersCount: legacy?.followers_count ?? 0,
    followingCount: legacy?.friends_count ?? 0,
    tweetCount: legacy?.statuses_count ?? 0,
    likeCount: legacy?.favourites_count ?? 0,
    verified: node.is_blue_verified || (legacy?.verified ?? false),
    createdAt: parseTwitterDate(node.core?.created_at ?? legacy?.created_at ?? null),
  };
}

// ─── Tweet ───

function mapMedia(node: MediaNode): Media {
  const mp4 = (node.video_info?.variants ?? [])
    .filter(present)
    .filter((variant) => variant.content_type === "video/mp4" && variant.url)
    .sort((a, b) => (b.bitrate ?? 0) - (a.bitrate ?? 0));

  return {
    type: node.type,
    url: node.url,
    expandedUrl: node.expanded_url,
    previewUrl: node.media_url_https,
    videoUrl: mp4[0]?.url ?? null,
  };
}

function mapNestedTweet(raw: unknown, path: string): Tweet | null {
  return isUnavailable(raw) ? null : mapTweet(raw, path);
}

export function mapTweet(raw: unknown, path = ""): Tweet {
  const parsed = tweetNodeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MappingError("tweet", path, "expected an object");
  }

  const node = parsed.data;
  // TweetWithVisibilityResults keeps the actual tweet one level down
  if (!node.legacy && node.tweet !== undefined) {
    return mapTweet(node.tweet, joinPath(path, "tweet"));
  }

  const legacy = node.legacy;
  const id = legacy?.id_str ?? node.rest_id;
  if (!id) {
    throw new MappingError("tweet", joinPath(path, "rest_id"), "missing id");
  }

  const authorNode = node.core?.user_results?.result;
  const retweetNode = legacy?.retweeted_status_result?.result;
  const entities = legacy?.entities;

  return {
    id,
    text: node.note_tweet?.note_tweet_results?.result?.text ?? legacy?.full_text ?? null,
    createdAt: parseTwitterDate(legacy?.created_at ?? null),
    author: isUnavailable(authorNode) ? null : mapUser(authorNode, joinPath(path, "core.user_results.result")),
    likeCount: legacy?.favorite_count ?? 0,
    retweetCount: legacy?.retweet_count ?? 0,
    replyCount: legacy?.reply_count ?? 0,
    quoteCount: legacy?.quote_count ?? 0,
    bookmarkCount: legacy?.bookmark_count ?? 0,
    viewCount: node.views?.count ?? 0,
    lang: legacy?.lang ?? null,
    conversationId: legacy?.conversation_id_str ?? null,
    inReplyToTweetId: legacy?.in_reply_to_status_id_str ?? null,
    inReplyToScreenName: legacy?.in_reply_to_screen_name ?? null,
    media: (legacy?.extended_entities?.media ?? []).filter(present).map(mapMedia),
    urls: (entities?.urls ?? []).filter(present).flatMap((entry) =>
      entry.url ? [{ url: entry.url, expandedUrl: entry.expanded_url, displayUrl: entry.display_url }] : []
    ),
    mentions: (entities?.user_mentions ?? []).filter(present).flatMap((entry) =>
      entry.screen_name ? [{ id: entry.id_str, screenName: entry.screen_name, name: entry.name }] : []
    ),
    hashtags: (entities?.hashtags ?? []).filter(present).flatMap((entry) => (entry.text ? [entry.text] : [])),
    isRetweet: retweetNode !== undefined,
    retweetedTweet: mapNestedTweet(retweetNode, joinPath(path, "legacy.retweeted_status_result.result")),
    quotedTweet: mapNestedTweet(node.quoted_status_result?.result, joinPath(path, "quoted_status_result.result")),
  };
}

export function mapRecord(kind: "tweet", raw: unknown): Tweet;
export function mapRecord(kind: "user", raw: unknown): User;
export function mapRecord(kind: RecordKind, raw: unknown): Tweet | User;
export function mapRecord(kind: RecordKind, raw: unknown): Tweet | User {
  return kind === "tweet" ? mapTweet(raw) : mapUser(raw);
}

// ─── Timeline ───

/**
 * Collect tweets, users and cursors from a GraphQL timeline `instructions` array,
 * in upstream order. Withheld entries are skipped; everything else must map.
 */
export function mapTimeline(instructions: unknown): Timeline {
  const tweets: Tweet[] = [];
  const users: User[] = [];
  let nextCursor: string | undefined;
  let previousCursor: string | undefined;

  const takeCursor = (cursorType: string | null, value: string | null) => {
    if (!value) return;
    if (cursorType === "Bottom") nextCursor = value;
    if (cursorType === "Top") previousCursor = value;
  };

  const visitItem = (item: ItemContent, path: string) => {
    takeCursor(item.cursorType, item.value);

    if (item.__typename === "TimelineTweet") {
      const result = item.tweet_results?.result;
      if (!isUnavailable(result)) {
        tweets.push(mapTweet(result, joinPath(path, "tweet_results.result")));
      }
    } else if (item.__typename === "TimelineUser") {
      const result = item.user_results?.result;
      if (!isUnavailable(result)) {
        users.push(mapUser(result, joinPath(path, "user_results.result")));
      }
    }
  };

  instructionsSchema.parse(instructions).forEach((instruction, i) => {
    if (!instruction) return;

    const entries = instruction.entry
      ? [{ entry: instruction.entry, path: `instructions[${i}].entry` }]
      : instruction.entries.flatMap((entry, j) =>
          entry ? [{ entry, path: `instructions[${i}].entries[${j}]` }] : []
        );

    for (const { entry, path } of entries) {
      const content = entry.content;
      if (!content) continue;

      takeCursor(content.cursorType, content.value);
      if (content.itemContent) {
        visitItem(content.itemContent, `${path}.content.itemContent`);
      }
      content.items.forEach((moduleItem, k) => {
        const itemContent = moduleItem?.item?.itemContent;
        if (itemContent) {
          visitItem(itemContent, `${path}.content.items[${k}].item.itemContent`);
        }
      });
    }
  });

  return { tweets, users, nextCursor, previousCursor };
}

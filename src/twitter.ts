import { RequestExecutor } from "./client/index.js";
import type { ClientOptions, Page } from "./client/index.js";
import {
  loadCredentials,
  requireAuthToken,
  type CredentialOverrides,
  type Credentials,
  type LoadCredentialsOptions,
} from "./config.js";
import { MappingError, UpstreamError } from "./errors.js";
import { isUnavailable, mapTimeline, mapTweet, mapUser, valueAt } from "./mapper/index.js";
import type { Timeline, Tweet, User } from "./mapper/index.js";
import { parseMarkdownToRichtext } from "./richtext.js";

export const SEARCH_PRODUCTS = ["Latest", "Top", "People", "Photos", "Videos"] as const;
export type SearchProduct = (typeof SEARCH_PRODUCTS)[number];
export type TweetSearchProduct = Exclude<SearchProduct, "People">;

export interface PageOptions {
  count?: number;
  cursor?: string;
  includePromotedContent?: boolean;
}

export interface SearchOptions extends PageOptions {
  product?: TweetSearchProduct;
}

export interface CreateTweetOptions {
  replyTo?: string;
}

export interface CreateNoteTweetOptions extends CreateTweetOptions {
  /** Convert markdown bold/italic into rich-text tags (default: true) */
  richtext?: boolean;
}

const DEFAULT_COUNT = 20;

const SEARCH_INSTRUCTIONS = ["data", "search_by_raw_query", "search_timeline", "timeline", "instructions"];
const LIST_INSTRUCTIONS = ["data", "list", "tweets_timeline", "timeline", "instructions"];
const USER_RESULT = ["data", "user", "result"];

function toPage<T>(data: T[], timeline: Timeline): Page<T> {
  return { data, nextCursor: timeline.nextCursor };
}

function replyVariables(replyTo?: string): Record<string, unknown> {
  return replyTo ? { reply: { in_reply_to_tweet_id: replyTo, exclude_reply_user_ids: [] } } : {};
}

function createdTweetId(data: unknown, path: readonly string[]): string {
  const id = valueAt(data, path);
  if (typeof id !== "string" || id.length === 0) {
    throw new MappingError("tweet", path.join("."), "missing id of the created tweet");
  }
  return id;
}

// ─── Client ───

export class TwitterClient {
  private readonly credentials: Credentials;
  private readonly executor: RequestExecutor;

  constructor(credentials: Credentials, options: ClientOptions = {}) {
    this.credentials = credentials;
    this.executor = new RequestExecutor(credentials.apiKey, options);
  }

  /** Build a client from explicit values, the environment and .env files, in that order */
  static fromEnvironment(
    overrides: CredentialOverrides = {},
    options: ClientOptions = {},
    loadOptions: LoadCredentialsOptions = {}
  ): TwitterClient {
    return new TwitterClient(loadCredentials(overrides, loadOptions), options);
  }

  private async query(endpoint: string, variables: Record<string, unknown>): Promise<unknown> {
    const res = await this.executor.request("GET", `/graphql/${endpoint}`, { params: { variables } });
    return res.data;
  }

  private async mutate(operation: string, endpoint: string, variables: Record<string, unknown>): Promise<unknown> {
    const authToken = requireAuthToken(this.credentials, operation);
    const res = await this.executor.request("POST", `/graphql/${endpoint}`, {
      body: { variables },
      authToken,
    });
    return res.data;
  }

  // ─── Search ───

  /** Search tweets; product is one of Latest, Top, Photos, Videos */
  async searchTimeline(query: string, options: SearchOptions = {}): Promise<Page<Tweet>> {
    const timeline = await this.searchRaw(query, options.product ?? "Latest", options);
    return toPage(timeline.tweets, timeline);
  }

  /** Search accounts (the People tab) */
  async searchUsers(query: string, options: PageOptions = {}): Promise<Page<User>> {
    const timeline = await this.searchRaw(query, "People", options);
    return toPage(timeline.users, timeline);
  }

  private async searchRaw(query: string, product: SearchProduct, options: PageOptions): Promise<Timeline> {
    const data = await this.query("SearchTimeline", {
      rawQuery: query,
      count: options.count ?? DEFAULT_COUNT,
      cursor: options.cursor,
      querySource: "typed_query",
      product,
      includePromotedContent: options.includePromotedContent ?? false,
    });
    return mapTimeline(valueAt(data, SEARCH_INSTRUCTIONS));
  }

  // ─── Users ───

  /** Look up a profile; null when the account does not exist or is withheld */
  async getUserByScreenName(screenName: string): Promise<User | null> {
    const data = await this.query("UserByScreenName", {
      screen_name: screenName.replace(/^@/, ""),
      withSafetyModeUserFields: true,
      withHighlightedLabel: true,
    });
    const result = valueAt(data, USER_RESULT);
    return isUnavailable(result) ? null : mapUser(result, USER_RESULT.join("."));
  }

  /** Accounts the given user follows */
  async getFollowing(userId: string, options: PageOptions = {}): Promise<Page<User>> {
    const data = await this.query("Following", {
      userId,
      count: options.count ?? DEFAULT_COUNT,
      cursor: options.cursor,
      includePromotedContent: options.includePromotedContent ?? false,
    });
    const timeline = mapTimeline(valueAt(data, [...USER_RESULT, "timeline", "timeline", "instructions"]));
    return toPage(timeline.users, timeline);
  }

  // ─── Timelines ───

  /** A user's tweets, pinned tweet first when there is one */
  async getUserTweets(userId: string, options: PageOptions = {}): Promise<Page<Tweet>> {
    const data = await this.query("UserTweets", {
      userId,
      count: options.count ?? DEFAULT_COUNT,
      cursor: options.cursor,
      includePromotedContent: options.includePromotedContent ?? false,
      withQuickPromoteEligibilityTweetFields: true,
      withVoice: true,
      withV2Timeline: true,
    });
    const instructions =
      valueAt(data, [...USER_RESULT, "timeline_v2", "timeline", "instructions"]) ??
      valueAt(data, [...USER_RESULT, "timeline", "timeline", "instructions"]);
    const timeline = mapTimeline(instructions);
    return toPage(timeline.tweets, timeline);
  }

  /** Latest tweets from a list */
  async getListLatestTweets(listId: string, options: PageOptions = {}): Promise<Page<Tweet>> {
    const data = await this.query("ListLatestTweetsTimeline", {
      listId,
      count: options.count ?? DEFAULT_COUNT,
      cursor: options.cursor,
      includePromotedContent: options.includePromotedContent ?? false,
    });
    const timeline = mapTimeline(valueAt(data, LIST_INSTRUCTIONS));
    return toPage(timeline.tweets, timeline);
  }

  // ─── Posts ───

  /** Fetch one tweet; null when it was deleted or is withheld */
  async getTweet(tweetId: string): Promise<Tweet | null> {
    const data = await this.query("TweetResultByRestId", {
      tweetId,
      withCommunity: false,
      includePromotedContent: false,
      withVoice: false,
    });
    const path = ["data", "tweetResult", "result"];
    const result = valueAt(data, path);
    return isUnavailable(result) ? null : mapTweet(result, path.join("."));
  }

  /** Post a tweet or a reply; returns the new tweet's id */
  async createTweet(text: string, options: CreateTweetOptions = {}): Promise<string> {
    const data = await this.mutate("createTweet", "CreateTweet", {
      tweet_text: text,
      dark_request: false,
      media: { media_entities: [], possibly_sensitive: false },
      semantic_annotation_ids: [],
      ...replyVariables(options.replyTo),
    });
    return createdTweetId(data, ["data", "create_tweet", "tweet_results", "result", "rest_id"]);
  }

  /** Post a long-form note tweet; markdown bold/italic become rich text unless disabled */
  async createNoteTweet(text: string, options: CreateNoteTweetOptions = {}): Promise<string> {
    const { text: plain, tags } = options.richtext === false ? { text, tags: [] } : parseMarkdownToRichtext(text);
    const data = await this.mutate("createNoteTweet", "CreateNoteTweet", {
      tweet_text: plain,
      richtext_options: { richtext_tags: tags },
      media: { media_entities: [], possibly_sensitive: false },
      semantic_annotation_ids: [],
      ...replyVariables(options.replyTo),
    });
    return createdTweetId(data, ["data", "notetweet_create", "tweet_results", "result", "rest_id"]);
  }

  // ─── Likes ───

  /** Like a tweet */
  async favoriteTweet(tweetId: string): Promise<boolean> {
    const data = await this.mutate("favoriteTweet", "FavoriteTweet", { tweet_id: tweetId });
    return valueAt(data, ["data", "favorite_tweet"]) === "Done";
  }

  // ─── Account ───

  /** Remaining request credits on the API key */
  async getBalance(): Promise<number> {
    const res = await this.executor.request("GET", `/key/${encodeURIComponent(this.credentials.apiKey)}`, {
      responseType: "text",
    });
    const raw = typeof res.data === "string" ? res.data.trim() : "";
    const balance = Number.parseInt(raw, 10);
    if (!/^-?\d+$/.test(raw) || Number.isNaN(balance)) {
      throw new UpstreamError(res.status, `Unexpected balance response: ${raw.slice(0, 100)}`);
    }
    return balance;
  }
}

export type TwitterOperations = Pick<
  TwitterClient,
  | "searchTimeline"
  | "searchUsers"
  | "getUserByScreenName"
  | "getFollowing"
  | "getUserTweets"
  | "getListLatestTweets"
  | "getTweet"
  | "createTweet"
  | "createNoteTweet"
  | "favoriteTweet"
  | "getBalance"
>;

// ─── Records ───

export interface User {
  readonly id: string;
  readonly screenName: string | null;
  readonly name: string | null;
  readonly description: string | null;
  readonly location: string | null;
  readonly avatarUrl: string | null;
  readonly url: string | null;
  readonly followersCount: number;
  readonly followingCount: number;
  readonly tweetCount: number;
  readonly likeCount: number;
  readonly verified: boolean;
  /** ISO-8601 */
  readonly createdAt: string | null;
}

export type MediaType = "photo" | "video" | "animated_gif";

export interface Media {
  readonly type: MediaType;
  /** t.co link as it appears in the text */
  readonly url: string | null;
  readonly expandedUrl: string | null;
  readonly previewUrl: string | null;
  /** Highest-bitrate mp4 variant, for video and animated_gif */
  readonly videoUrl: string | null;
}

export interface UrlEntity {
  readonly url: string;
  readonly expandedUrl: string | null;
  readonly displayUrl: string | null;
}

export interface UserMention {
  readonly id: string | null;
  readonly screenName: string;
  readonly name: string | null;
}

export interface Tweet {
  readonly id: string;
  readonly text: string | null;
  /** ISO-8601 */
  readonly createdAt: string | null;
  readonly author: User | null;
  readonly likeCount: number;
  readonly retweetCount: number;
  readonly replyCount: number;
  readonly quoteCount: number;
  readonly bookmarkCount: number;
  readonly viewCount: number;
  readonly lang: string | null;
  readonly conversationId: string | null;
  readonly inReplyToTweetId: string | null;
  readonly inReplyToScreenName: string | null;
  readonly media: readonly Media[];
  readonly urls: readonly UrlEntity[];
  readonly mentions: readonly UserMention[];
  readonly hashtags: readonly string[];
  readonly isRetweet: boolean;
  readonly retweetedTweet: Tweet | null;
  readonly quotedTweet: Tweet | null;
}

export interface Timeline {
  readonly tweets: Tweet[];
  readonly users: User[];
  readonly nextCursor?: string;
  readonly previousCursor?: string;
}

export { TwitterClient, SEARCH_PRODUCTS } from "./twitter.js";
export type {
  CreateNoteTweetOptions,
  CreateTweetOptions,
  PageOptions,
  SearchOptions,
  SearchProduct,
  TweetSearchProduct,
  TwitterOperations,
} from "./twitter.js";

export { RequestExecutor, DEFAULT_RETRY_POLICY, BASE_URL, resolveRetryPolicy } from "./client/index.js";
export type {
  ApiResponse,
  BackoffStrategy,
  ClientOptions,
  Page,
  QueryParams,
  RequestMethod,
  RequestOptions,
  RetryEvent,
  RetryPolicy,
  RetryReason,
} from "./client/index.js";

export { mapRecord, mapTimeline, mapTweet, mapUser } from "./mapper/index.js";
export type { Media, MediaType, Timeline, Tweet, UrlEntity, User, UserMention } from "./mapper/index.js";

export { API_KEY_ENV, AUTH_TOKEN_ENV, loadCredentials } from "./config.js";
export type { CredentialOverrides, Credentials, LoadCredentialsOptions } from "./config.js";

export {
  ApidanceError,
  ConfigurationError,
  ConnectionFailureError,
  MappingError,
  RateLimitExceededError,
  UpstreamError,
} from "./errors.js";
export type { ApidanceErrorKind, RecordKind, UpstreamErrorReason } from "./errors.js";

export { parseMarkdownToRichtext } from "./richtext.js";
export type { Richtext, RichtextTag, RichtextType } from "./richtext.js";

export { createMcpServer, startStdioServer } from "./mcp/server.js";
export { VERSION } from "./version.js";

import { z } from "zod";
import { ApidanceError } from "../errors.js";
import { SEARCH_PRODUCTS, type TwitterOperations } from "../twitter.js";

// ─── Tool Input Shapes ───

const id = z.union([z.string().min(1), z.number().int().nonnegative()]).transform((value) => String(value));
const count = z.number().int().min(1).max(100).default(20);

export const searchTweetsShape = {
  query: z.string().min(1).describe("Search query; supports X advanced search operators"),
  product: z.enum(SEARCH_PRODUCTS).default("Latest").describe("One of Top, Latest, People, Photos, Videos"),
  count,
  cursor: z.string().optional().describe("Pagination cursor from a previous response"),
};

export const getUserInfoShape = {
  screen_name: z.string().min(1).describe("Username, with or without @"),
};

export const getUserTweetsShape = {
  user_id: id.optional().describe("User id; either user_id or screen_name is required"),
  screen_name: z.string().min(1).optional().describe("Username; either user_id or screen_name is required"),
  count,
  cursor: z.string().optional(),
};

export const getListTweetsShape = {
  list_id: id.describe("List id"),
  count,
  cursor: z.string().optional(),
};

export const getFollowingShape = {
  user_id: id.describe("User id whose followed accounts are returned"),
  count,
  cursor: z.string().optional(),
};

export const getTweetShape = {
  tweet_id: id.describe("Tweet id"),
};

export const createTweetShape = {
  text: z.string().min(1).describe("Tweet text"),
  reply_to_tweet_id: id.optional().describe("Tweet id to reply to"),
};

export const createNoteTweetShape = {
  text: z.string().min(1).describe("Long-form text; markdown bold/italic allowed when use_richtext is true"),
  use_richtext: z.boolean().default(true),
  reply_to_tweet_id: id.optional(),
};

export const likeTweetShape = {
  tweet_id: id.describe("Tweet id to like"),
};

type Input<Shape extends z.ZodRawShape> = z.infer<z.ZodObject<Shape>>;

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function ok(payload: Record<string, unknown>): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify({ success: true, ...payload }, null, 2) }] };
}

function fail(message: string, error?: unknown): ToolResult {
  const body: Record<string, unknown> = { success: false, message };
  if (error !== undefined) {
    body.error = error instanceof Error ? error.message : String(error);
    if (error instanceof ApidanceError) {
      body.kind = error.kind;
    }
  }
  return { content: [{ type: "text", text: JSON.stringify(body, null, 2) }], isError: true };
}

async function guarded(message: string, run: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await run();
  } catch (error) {
    return fail(message, error);
  }
}

// ─── Handlers ───

export function createToolHandlers(client: TwitterOperations) {
  return {
    searchTweets: (args: Input<typeof searchTweetsShape>) =>
      guarded("Failed to search tweets", async () => {
        const page = { count: args.count, cursor: args.cursor };
        if (args.product === "People") {
          const users = await client.searchUsers(args.query, page);
          return ok({ users: users.data, count: users.data.length, next_cursor: users.nextCursor });
        }
        const tweets = await client.searchTimeline(args.query, { ...page, product: args.product });
        return ok({
          tweets: tweets.data,
          count: tweets.data.length,
          next_cursor: tweets.nextCursor,
          message: `Found ${tweets.data.length} tweets matching query: ${args.query}`,
        });
      }),

    getUserInfo: (args: Input<typeof getUserInfoShape>) =>
      guarded(`Failed to retrieve user information for @${args.screen_name}`, async () => {
        const user = await client.getUserByScreenName(args.screen_name);
        return user ? ok({ user }) : fail(`User @${args.screen_name} not found`);
      }),

    getUserTweets: (args: Input<typeof getUserTweetsShape>) =>
      guarded("Failed to retrieve user tweets", async () => {
        let userId = args.user_id;
        if (!userId && args.screen_name) {
          const user = await client.getUserByScreenName(args.screen_name);
          if (!user) return fail(`User @${args.screen_name} not found`);
          userId = user.id;
        }
        if (!userId) return fail("Either user_id or screen_name must be provided");

        const tweets = await client.getUserTweets(userId, { count: args.count, cursor: args.cursor });
        return ok({ user_id: userId, tweets: tweets.data, count: tweets.data.length, next_cursor: tweets.nextCursor });
      }),

    getListTweets: (args: Input<typeof getListTweetsShape>) =>
      guarded("Failed to retrieve list tweets", async () => {
        const tweets = await client.getListLatestTweets(args.list_id, { count: args.count, cursor: args.cursor });
        return ok({ tweets: tweets.data, count: tweets.data.length, next_cursor: tweets.nextCursor });
      }),

    getFollowing: (args: Input<typeof getFollowingShape>) =>
      guarded("Failed to retrieve following", async () => {
        const users = await client.getFollowing(args.user_id, { count: args.count, cursor: args.cursor });
        return ok({ users: users.data, count: users.data.length, next_cursor: users.nextCursor });
      }),

    getTweet: (args: Input<typeof getTweetShape>) =>
      guarded("Failed to retrieve tweet", async () => {
        const tweet = await client.getTweet(args.tweet_id);
        return tweet ? ok({ tweet }) : fail("Tweet not found");
      }),

    createTweet: (args: Input<typeof createTweetShape>) =>
      guarded("Failed to create tweet", async () => {
        const tweetId = await client.createTweet(args.text, { replyTo: args.reply_to_tweet_id });
        return ok({ tweet_id: tweetId, message: "Tweet created successfully" });
      }),

    createNoteTweet: (args: Input<typeof createNoteTweetShape>) =>
      guarded("Failed to create note tweet", async () => {
        const tweetId = await client.createNoteTweet(args.text, {
          richtext: args.use_richtext,
          replyTo: args.reply_to_tweet_id,
        });
        return ok({ tweet_id: tweetId, message: "Note tweet created successfully" });
      }),

    likeTweet: (args: Input<typeof likeTweetShape>) =>
      guarded("Failed to like tweet", async () => {
        const liked = await client.favoriteTweet(args.tweet_id);
        return liked ? ok({ tweet_id: args.tweet_id, liked }) : fail(`Tweet ${args.tweet_id} was not liked`);
      }),
  };
}

export type ToolHandlers = ReturnType<typeof createToolHandlers>;

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { TwitterOperations } from "../twitter.js";
import { VERSION } from "../version.js";
import {
  createNoteTweetShape,
  createToolHandlers,
  createTweetShape,
  getFollowingShape,
  getListTweetsShape,
  getTweetShape,
  getUserInfoShape,
  getUserTweetsShape,
  likeTweetShape,
  searchTweetsShape,
} from "./tools.js";

export const SERVER_NAME = "apidance";

/** Register every client operation as an MCP tool */
export function createMcpServer(client: TwitterOperations): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: VERSION });
  const handlers = createToolHandlers(client);

  server.tool(
    "search_tweets",
    "Search tweets, or accounts with product People",
    searchTweetsShape,
    (args) => handlers.searchTweets(args)
  );
  server.tool("get_user_info", "Get a user's profile by screen name", getUserInfoShape, (args) =>
    handlers.getUserInfo(args)
  );
  server.tool("get_user_tweets", "Get recent tweets from a user", getUserTweetsShape, (args) =>
    handlers.getUserTweets(args)
  );
  server.tool("get_list_tweets", "Get the latest tweets from a list", getListTweetsShape, (args) =>
    handlers.getListTweets(args)
  );
  server.tool("get_following", "Get the accounts a user follows", getFollowingShape, (args) =>
    handlers.getFollowing(args)
  );
  server.tool("get_tweet_by_id", "Get a single tweet by id", getTweetShape, (args) => handlers.getTweet(args));
  server.tool("create_tweet", "Post a tweet or a reply", createTweetShape, (args) => handlers.createTweet(args));
  server.tool(
    "create_note_tweet",
    "Post a long-form note tweet; markdown bold/italic become rich text",
    createNoteTweetShape,
    (args) => handlers.createNoteTweet(args)
  );
  server.tool("like_tweet", "Like a tweet", likeTweetShape, (args) => handlers.likeTweet(args));

  return server;
}

/** Serve over stdio. stdout carries the protocol, so diagnostics go to stderr. */
export async function startStdioServer(client: TwitterOperations): Promise<McpServer> {
  const server = createMcpServer(client);
  await server.connect(new StdioServerTransport());
  console.error(`${SERVER_NAME} MCP server ${VERSION} listening on stdio`);
  return server;
}

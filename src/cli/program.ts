import { Command, InvalidArgumentError, Option } from "commander";
import { SEARCH_PRODUCTS, type SearchProduct, type TwitterOperations } from "../twitter.js";
import { VERSION } from "../version.js";

export interface CliDeps {
  createClient: () => TwitterOperations;
  write: (text: string) => void;
  serve: (client: TwitterOperations) => Promise<unknown>;
}

interface PageFlags {
  count: number;
  cursor?: string;
}

// ─── Argument Parsers ───

const countArgument = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || parsed < 1 || parsed > 100) {
    throw new InvalidArgumentError("Expected an integer between 1 and 100.");
  }
  return parsed;
};

function isSearchProduct(value: string): value is SearchProduct {
  return SEARCH_PRODUCTS.some((product) => product === value);
}

export function createProgram(deps: CliDeps): Command {
  let client: TwitterOperations | undefined;
  const getClient = (): TwitterOperations => {
    if (!client) client = deps.createClient();
    return client;
  };
  const print = (value: unknown) => deps.write(`${JSON.stringify(value, null, 2)}\n`);

  const program = new Command();
  program
    .name("apidance")
    .description(`X/Twitter from the command line through the Apidance proxy.
  Credentials come from the environment or .env / ~/.config/apidance/.env:
    - APIDANCE_API_KEY: your Apidance API key (required)
    - X_AUTH_TOKEN: session token, needed by post, note and like`)
    .version(VERSION);

  const withPaging = (command: Command) =>
    command
      .option("-n, --count <num>", "results per page (1-100)", countArgument, 20)
      .option("-c, --cursor <cursor>", "pagination cursor from a previous page");

  // ─── Reads ───

  withPaging(
    program
      .command("search")
      .description("Search tweets, or accounts with --product People")
      .argument("<query>", "search query, advanced operators allowed")
      .addOption(new Option("-p, --product <product>", "result tab").choices(SEARCH_PRODUCTS).default("Latest"))
  ).action(async (query: string, flags: PageFlags & { product: string }) => {
    const product = isSearchProduct(flags.product) ? flags.product : "Latest";
    const paging = { count: flags.count, cursor: flags.cursor };
    if (product === "People") {
      print(await getClient().searchUsers(query, paging));
      return;
    }
    print(await getClient().searchTimeline(query, { ...paging, product }));
  });

  program
    .command("user")
    .description("Show a profile")
    .argument("<screenName>", "username, with or without @")
    .action(async (screenName: string) => {
      const user = await getClient().getUserByScreenName(screenName);
      if (!user) throw new Error(`User @${screenName.replace(/^@/, "")} not found`);
      print(user);
    });

  withPaging(program.command("tweets").description("Recent tweets from a user").argument("<userId>")).action(
    async (userId: string, flags: PageFlags) => {
      print(await getClient().getUserTweets(userId, flags));
    }
  );

  withPaging(program.command("list").description("Latest tweets from a list").argument("<listId>")).action(
    async (listId: string, flags: PageFlags) => {
      print(await getClient().getListLatestTweets(listId, flags));
    }
  );

  withPaging(program.command("following").description("Accounts a user follows").argument("<userId>")).action(
    async (userId: string, flags: PageFlags) => {
      print(await getClient().getFollowing(userId, flags));
    }
  );

  program
    .command("show")
    .description("Show one tweet")
    .argument("<tweetId>")
    .action(async (tweetId: string) => {
      const tweet = await getClient().getTweet(tweetId);
      if (!tweet) throw new Error(`Tweet ${tweetId} not found`);
      print(tweet);
    });

  program
    .command("balance")
    .description("Remaining credits on the API key")
    .action(async () => {
      print({ balance: await getClient().getBalance() });
    });

  // ─── Writes ───

  program
    .command("post")
    .description("Post a tweet")
    .argument("<text>")
    .option("-r, --reply-to <tweetId>", "reply to this tweet")
    .action(async (text: string, flags: { replyTo?: string }) => {
      print({ id: await getClient().createTweet(text, { replyTo: flags.replyTo }) });
    });

  program
    .command("note")
    .description("Post a long-form note tweet; **bold** and *italic* become rich text")
    .argument("<text>")
    .option("--plain", "send markdown markers as-is")
    .option("-r, --reply-to <tweetId>", "reply to this tweet")
    .action(async (text: string, flags: { plain?: boolean; replyTo?: string }) => {
      const id = await getClient().createNoteTweet(text, { richtext: !flags.plain, replyTo: flags.replyTo });
      print({ id });
    });

  program
    .command("like")
    .description("Like a tweet")
    .argument("<tweetId>")
    .action(async (tweetId: string) => {
      print({ id: tweetId, liked: await getClient().favoriteTweet(tweetId) });
    });

  // ─── Server ───

  program
    .command("mcp")
    .description("Serve every command as an MCP tool over stdio")
    .action(async () => {
      await deps.serve(getClient());
    });

  return program;
}

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, MappingError, UpstreamError } from "../src/errors.js";
import { TwitterClient } from "../src/twitter.js";
import {
  addEntries,
  cursorEntry,
  jsonResponse,
  rawTweet,
  rawUser,
  searchPayload,
  textResponse,
  tweetEntry,
  userEntry,
} from "./helpers.js";

const fetchMock = vi.fn<typeof fetch>();

const readOnly = new TwitterClient({ apiKey: "test-key" }, { retry: { baseDelayMs: 0 } });
const withToken = new TwitterClient({ apiKey: "test-key", authToken: "test-token" }, { retry: { baseDelayMs: 0 } });

function sentUrl(call = 0): URL {
  return new URL(String(fetchMock.mock.calls[call][0]));
}

function sentVariables(call = 0): unknown {
  return JSON.parse(sentUrl(call).searchParams.get("variables") ?? "null");
}

function sentBody(call = 0): unknown {
  return JSON.parse(String(fetchMock.mock.calls[call][1]?.body));
}

function sentHeaders(call = 0): unknown {
  return fetchMock.mock.calls[call][1]?.headers;
}

describe("TwitterClient", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ─── Search ───

  describe("searchTimeline", () => {
    it("maps tweets in order and returns the bottom cursor", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(searchPayload([tweetEntry(rawTweet("1")), tweetEntry(rawTweet("2")), cursorEntry("Bottom", "c2")]))
      );

      const page = await readOnly.searchTimeline("typescript");

      expect(page.data.map((tweet) => tweet.id)).toEqual(["1", "2"]);
      expect(page.nextCursor).toBe("c2");
      expect(sentUrl().pathname).toBe("/graphql/SearchTimeline");
      expect(sentVariables()).toEqual({
        rawQuery: "typescript",
        count: 20,
        querySource: "typed_query",
        product: "Latest",
        includePromotedContent: false,
      });
    });

    it("passes product, count and cursor through", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(searchPayload([])));

      const page = await readOnly.searchTimeline("from:alice", { product: "Photos", count: 5, cursor: "c1" });

      expect(page).toEqual({ data: [], nextCursor: undefined });
      expect(sentVariables()).toMatchObject({ product: "Photos", count: 5, cursor: "c1" });
    });

    it("returns an empty page when the timeline is missing", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: {} }));
      expect((await readOnly.searchTimeline("nothing")).data).toEqual([]);
    });
  });

  describe("searchUsers", () => {
    it("searches the People tab", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(searchPayload([userEntry(rawUser("8", "carol"))])));

      const page = await readOnly.searchUsers("carol");

      expect(page.data.map((user) => user.screenName)).toEqual(["carol"]);
      expect(sentVariables()).toMatchObject({ rawQuery: "carol", product: "People" });
    });
  });

  // ─── Users ───

  describe("getUserByScreenName", () => {
    it("strips a leading @ and maps the profile", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { user: { result: rawUser() } } }));

      const user = await readOnly.getUserByScreenName("@alice");

      expect(user?.id).toBe("42");
      expect(user?.followersCount).toBe(120);
      expect(sentUrl().pathname).toBe("/graphql/UserByScreenName");
      expect(sentVariables()).toEqual({
        screen_name: "alice",
        withSafetyModeUserFields: true,
        withHighlightedLabel: true,
      });
    });

    it("returns null for an unknown account", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: {} }));
      expect(await readOnly.getUserByScreenName("ghost")).toBeNull();
    });

    it("returns null for a withheld account", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ data: { user: { result: { __typename: "UserUnavailable", reason: "Suspended" } } } })
      );
      expect(await readOnly.getUserByScreenName("gone")).toBeNull();
    });
  });

  describe("getFollowing", () => {
    it("maps followed accounts", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: {
            user: {
              result: {
                timeline: {
                  timeline: {
                    instructions: [
                      addEntries([userEntry(rawUser("8", "carol")), userEntry(rawUser("9", "dave")), cursorEntry("Bottom", "f2")]),
                    ],
                  },
                },
              },
            },
          },
        })
      );

      const page = await readOnly.getFollowing("42", { count: 50 });

      expect(page.data.map((user) => user.id)).toEqual(["8", "9"]);
      expect(page.nextCursor).toBe("f2");
      expect(sentVariables()).toEqual({ userId: "42", count: 50, includePromotedContent: false });
    });
  });

  // ─── Timelines ───

  describe("getUserTweets", () => {
    it("puts the pinned tweet first", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: {
            user: {
              result: {
                timeline_v2: {
                  timeline: {
                    instructions: [
                      { type: "TimelineClearCache" },
                      { type: "TimelinePinEntry", entry: tweetEntry(rawTweet("9")) },
                      addEntries([tweetEntry(rawTweet("8")), tweetEntry(rawTweet("7"))]),
                    ],
                  },
                },
              },
            },
          },
        })
      );

      const page = await readOnly.getUserTweets("42");
      expect(page.data.map((tweet) => tweet.id)).toEqual(["9", "8", "7"]);
    });

    it("falls back to the newer timeline key", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: { user: { result: { timeline: { timeline: { instructions: [addEntries([tweetEntry(rawTweet("6"))])] } } } } },
        })
      );

      const page = await readOnly.getUserTweets("42");
      expect(page.data.map((tweet) => tweet.id)).toEqual(["6"]);
    });
  });

  describe("getListLatestTweets", () => {
    it("maps list tweets", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: { list: { tweets_timeline: { timeline: { instructions: [addEntries([tweetEntry(rawTweet("3"))])] } } } },
        })
      );

      const page = await readOnly.getListLatestTweets("1234");

      expect(page.data.map((tweet) => tweet.id)).toEqual(["3"]);
      expect(sentVariables()).toEqual({ listId: "1234", count: 20, includePromotedContent: false });
    });

    it("surfaces an upstream error without retrying", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: "Invalid list_id" }));

      await expect(readOnly.getListLatestTweets("nope")).rejects.toBeInstanceOf(UpstreamError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  // ─── Posts ───

  describe("getTweet", () => {
    it("maps a single tweet", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { tweetResult: { result: rawTweet("55", "single") } } }));

      const tweet = await readOnly.getTweet("55");

      expect(tweet?.text).toBe("single");
      expect(sentVariables()).toMatchObject({ tweetId: "55" });
    });

    it("returns null for a deleted tweet", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { tweetResult: {} } }));
      expect(await readOnly.getTweet("56")).toBeNull();
    });
  });

  describe("createTweet", () => {
    it("needs a session token and makes no call without one", async () => {
      await expect(readOnly.createTweet("hi")).rejects.toBeInstanceOf(ConfigurationError);
      await expect(readOnly.createTweet("hi")).rejects.toMatchObject({ variable: "X_AUTH_TOKEN" });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("posts a reply and returns the new id", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ data: { create_tweet: { tweet_results: { result: { rest_id: "777" } } } } })
      );

      const id = await withToken.createTweet("hi", { replyTo: "5" });

      expect(id).toBe("777");
      expect(fetchMock.mock.calls[0][1]?.method).toBe("POST");
      expect(sentUrl().pathname).toBe("/graphql/CreateTweet");
      expect(sentHeaders()).toMatchObject({ AuthToken: "test-token" });
      expect(sentBody()).toEqual({
        variables: {
          tweet_text: "hi",
          dark_request: false,
          media: { media_entities: [], possibly_sensitive: false },
          semantic_annotation_ids: [],
          reply: { in_reply_to_tweet_id: "5", exclude_reply_user_ids: [] },
        },
      });
    });

    it("raises MappingError when the response has no id", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { create_tweet: {} } }));
      await expect(withToken.createTweet("hi")).rejects.toBeInstanceOf(MappingError);
    });
  });

  describe("createNoteTweet", () => {
    it("turns markdown into rich-text tags", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ data: { notetweet_create: { tweet_results: { result: { rest_id: "778" } } } } })
      );

      const id = await withToken.createNoteTweet("Ship **fast** and _learn_");

      expect(id).toBe("778");
      expect(sentUrl().pathname).toBe("/graphql/CreateNoteTweet");
      expect(sentBody()).toMatchObject({
        variables: {
          tweet_text: "Ship fast and learn",
          richtext_options: {
            richtext_tags: [
              { from_index: 5, to_index: 9, richtext_types: ["Bold"] },
              { from_index: 14, to_index: 19, richtext_types: ["Italic"] },
            ],
          },
        },
      });
    });

    it("sends markdown untouched when rich text is off", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ data: { notetweet_create: { tweet_results: { result: { rest_id: "779" } } } } })
      );

      await withToken.createNoteTweet("Ship **fast**", { richtext: false });

      expect(sentBody()).toMatchObject({
        variables: { tweet_text: "Ship **fast**", richtext_options: { richtext_tags: [] } },
      });
    });
  });

  // ─── Likes ───

  describe("favoriteTweet", () => {
    it("reports success when the upstream answers Done", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { favorite_tweet: "Done" } }));

      expect(await withToken.favoriteTweet("55")).toBe(true);
      expect(sentBody()).toEqual({ variables: { tweet_id: "55" } });
    });

    it("rejects without a session token", async () => {
      await expect(readOnly.favoriteTweet("55")).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  // ─── Account ───

  describe("getBalance", () => {
    it("parses the plain-text balance", async () => {
      fetchMock.mockResolvedValueOnce(textResponse("1500\n"));

      expect(await readOnly.getBalance()).toBe(1500);
      expect(sentUrl().pathname).toBe("/key/test-key");
    });

    it("rejects an unexpected body", async () => {
      fetchMock.mockResolvedValueOnce(textResponse("key not found"));
      await expect(readOnly.getBalance()).rejects.toBeInstanceOf(UpstreamError);
    });
  });

  describe("fromEnvironment", () => {
    it("builds a client from the environment", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { favorite_tweet: "Done" } }));

      const client = TwitterClient.fromEnvironment(
        {},
        {},
        { env: { APIDANCE_API_KEY: "env-key", X_AUTH_TOKEN: "env-token" }, configPaths: [] }
      );
      await client.favoriteTweet("1");

      expect(sentHeaders()).toEqual({
        apikey: "env-key",
        "Content-Type": "application/json",
        AuthToken: "env-token",
      });
    });
  });
});

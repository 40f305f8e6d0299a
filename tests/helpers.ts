export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status, headers: { "Content-Type": "text/plain" } });
}

export function rawUser(id = "42", screenName = "alice") {
  return {
    __typename: "User",
    id: "VXNlcjo0Mg==",
    rest_id: id,
    is_blue_verified: false,
    legacy: {
      name: "Alice Example",
      screen_name: screenName,
      description: "Writes tests",
      location: "Lisbon",
      profile_image_url_https: "https://pbs.example/alice.jpg",
      followers_count: 120,
      friends_count: 80,
      statuses_count: 1500,
      favourites_count: 33,
      verified: false,
      created_at: "Tue Mar 21 20:50:14 +0000 2006",
    },
  };
}

export function rawTweet(id = "1001", text = "hello world", author: unknown = rawUser()) {
  return {
    __typename: "Tweet",
    rest_id: id,
    core: { user_results: { result: author } },
    views: { count: "250", state: "EnabledWithCount" },
    legacy: {
      id_str: id,
      full_text: text,
      created_at: "Wed Oct 10 20:19:24 +0000 2018",
      favorite_count: 7,
      retweet_count: 2,
      reply_count: 1,
      quote_count: 0,
      bookmark_count: 3,
      lang: "en",
      conversation_id_str: id,
    },
  };
}

export function tweetEntry(result: unknown) {
  return {
    entryId: "tweet-entry",
    content: {
      entryType: "TimelineTimelineItem",
      itemContent: {
        itemType: "TimelineTweet",
        __typename: "TimelineTweet",
        tweet_results: { result },
      },
    },
  };
}

export function userEntry(result: unknown) {
  return {
    entryId: "user-entry",
    content: {
      entryType: "TimelineTimelineItem",
      itemContent: {
        itemType: "TimelineUser",
        __typename: "TimelineUser",
        user_results: { result },
      },
    },
  };
}

export function cursorEntry(cursorType: "Top" | "Bottom", value: string) {
  return {
    entryId: `cursor-${cursorType.toLowerCase()}`,
    content: {
      entryType: "TimelineTimelineCursor",
      __typename: "TimelineTimelineCursor",
      value,
      cursorType,
    },
  };
}

export function addEntries(entries: unknown[]) {
  return { type: "TimelineAddEntries", entries };
}

export function searchPayload(entries: unknown[]) {
  return {
    data: {
      search_by_raw_query: {
        search_timeline: { timeline: { instructions: [addEntries(entries)] } },
      },
    },
  };
}

export function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

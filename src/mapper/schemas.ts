import { z } from "zod";

// Leaves fall back to a default instead of failing, so a record is either
// fully typed or the field is null/zero. Unknown keys are stripped.

export const optionalText = z.string().min(1).nullable().catch(null);

export const flag = z.boolean().catch(false);

export const count = z
  .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/).transform((value) => Number(value))])
  .catch(0);

export const identifier = z
  .union([z.string().min(1), z.number().int().nonnegative().transform((value) => String(value))])
  .optional()
  .catch(undefined);

export function tolerant<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

/** Array whose malformed elements become null instead of sinking the whole list */
export function list<T extends z.ZodTypeAny>(item: T) {
  return z.array(item.nullable().catch(null)).catch([]);
}

const wrappedResult = z.object({ result: z.unknown() });

// ─── User ───

export const userNodeSchema = z.object({
  __typename: optionalText,
  rest_id: identifier,
  is_blue_verified: flag,
  core: tolerant(
    z.object({
      name: optionalText,
      screen_name: optionalText,
      created_at: optionalText,
    })
  ),
  avatar: tolerant(z.object({ image_url: optionalText })),
  location: tolerant(z.object({ location: optionalText })),
  legacy: tolerant(
    z.object({
      name: optionalText,
      screen_name: optionalText,
      description: optionalText,
      location: optionalText,
      url: optionalText,
      profile_image_url_https: optionalText,
      followers_count: count,
      friends_count: count,
      statuses_count: count,
      favourites_count: count,
      verified: flag,
      created_at: optionalText,
    })
  ),
});

// ─── Tweet ───

const urlEntitySchema = z.object({
  url: optionalText,
  expanded_url: optionalText,
  display_url: optionalText,
});

const mentionSchema = z.object({
  id_str: optionalText,
  screen_name: optionalText,
  name: optionalText,
});

const hashtagSchema = z.object({ text: optionalText });

const videoVariantSchema = z.object({
  content_type: optionalText,
  url: optionalText,
  bitrate: z.number().nonnegative().optional().catch(undefined),
});

export const mediaSchema = z.object({
  type: z.enum(["photo", "video", "animated_gif"]).catch("photo"),
  url: optionalText,
  expanded_url: optionalText,
  media_url_https: optionalText,
  video_info: tolerant(z.object({ variants: list(videoVariantSchema) })),
});

export const tweetNodeSchema = z.object({
  __typename: optionalText,
  rest_id: identifier,
  tweet: z.unknown().optional(),
  core: tolerant(z.object({ user_results: tolerant(wrappedResult) })),
  views: tolerant(z.object({ count })),
  note_tweet: tolerant(
    z.object({
      note_tweet_results: tolerant(z.object({ result: tolerant(z.object({ text: optionalText })) })),
    })
  ),
  quoted_status_result: tolerant(wrappedResult),
  legacy: tolerant(
    z.object({
      id_str: identifier,
      full_text: optionalText,
      created_at: optionalText,
      favorite_count: count,
      retweet_count: count,
      reply_count: count,
      quote_count: count,
      bookmark_count: count,
      lang: optionalText,
      conversation_id_str: optionalText,
      in_reply_to_status_id_str: optionalText,
      in_reply_to_screen_name: optionalText,
      entities: tolerant(
        z.object({
          urls: list(urlEntitySchema),
          user_mentions: list(mentionSchema),
          hashtags: list(hashtagSchema),
        })
      ),
      extended_entities: tolerant(z.object({ media: list(mediaSchema) })),
      retweeted_status_result: tolerant(wrappedResult),
    })
  ),
});

// ─── Timeline ───

export const itemContentSchema = z.object({
  __typename: optionalText,
  tweet_results: tolerant(wrappedResult),
  user_results: tolerant(wrappedResult),
  cursorType: optionalText,
  value: optionalText,
});

const entryContentSchema = z.object({
  entryType: optionalText,
  itemContent: tolerant(itemContentSchema),
  items: list(z.object({ item: tolerant(z.object({ itemContent: tolerant(itemContentSchema) })) })),
  cursorType: optionalText,
  value: optionalText,
});

const entrySchema = z.object({
  entryId: optionalText,
  content: tolerant(entryContentSchema),
});

export const instructionsSchema = list(
  z.object({
    type: optionalText,
    entries: list(entrySchema),
    entry: tolerant(entrySchema),
  })
);

export type ItemContent = z.infer<typeof itemContentSchema>;
export type MediaNode = z.infer<typeof mediaSchema>;

export type RichtextType = "Bold" | "Italic";

/** Wire shape expected by CreateNoteTweet's `richtext_options.richtext_tags` */
export interface RichtextTag {
  from_index: number;
  to_index: number;
  richtext_types: RichtextType[];
}

export interface Richtext {
  text: string;
  tags: RichtextTag[];
}

interface Mark {
  start: number;
  end: number;
  type: RichtextType;
}

const BOLD = /(?<!\*)\*\*([^*]+?)\*\*(?!\*)|__([^_]+?)__/g;
const ITALIC = /(?<!\*)\*([^*]+?)\*(?!\*)|(?<!_)_([^_]+?)_(?!_)/g;

const DELIMITER_LENGTH: Record<RichtextType, number> = { Bold: 2, Italic: 1 };

function findMarks(pattern: RegExp, text: string, type: RichtextType): Mark[] {
  return [...text.matchAll(pattern)].map((match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
    type,
  }));
}

function codePointLength(value: string): number {
  return [...value].length;
}

/**
 * Strip `**bold**` / `__bold__` and `*italic*` / `_italic_` markers, returning the plain
 * text plus tags whose indices count code points of it. Overlapping markers keep the earlier one.
 */
export function parseMarkdownToRichtext(markdown: string): Richtext {
  const marks = [...findMarks(BOLD, markdown, "Bold"), ...findMarks(ITALIC, markdown, "Italic")].sort(
    (a, b) => a.start - b.start || a.end - b.end
  );

  let text = "";
  let offset = 0;
  let cursor = 0;
  const tags: RichtextTag[] = [];

  for (const mark of marks) {
    if (mark.start < cursor) continue;

    const delimiter = DELIMITER_LENGTH[mark.type];
    const before = markdown.slice(cursor, mark.start);
    const content = markdown.slice(mark.start + delimiter, mark.end - delimiter);
    offset += codePointLength(before);
    const length = codePointLength(content);
    tags.push({ from_index: offset, to_index: offset + length, richtext_types: [mark.type] });
    offset += length;
    text += before + content;
    cursor = mark.end;
  }
  text += markdown.slice(cursor);

  return { text, tags };
}

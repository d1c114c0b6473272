// pattern: Functional Core

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return String.fromCodePoint(Number.parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith("#")) {
      return String.fromCodePoint(Number.parseInt(entity.slice(1), 10));
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? whole;
  });
}

/**
 * Drop markup and collapse whitespace
 */
export function htmlToText(html: string): string {
  return decodeEntities(
    html
      .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, " ")
      .replace(/<[^>]+>/g, " ")
  )
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Text of the first capture group of `pattern`, or undefined
 */
export function extractText(html: string, pattern: RegExp): string | undefined {
  const captured = pattern.exec(html)?.[1];
  if (captured === undefined) {
    return undefined;
  }
  const text = htmlToText(captured);
  return text.length > 0 ? text : undefined;
}

/**
 * Content attribute of `<meta name="...">`, in either attribute order
 */
export function extractMetaContent(html: string, name: string): string | undefined {
  for (const tag of html.match(/<meta\b[^>]*>/gi) ?? []) {
    const tagName = /\bname\s*=\s*["']([^"']*)["']/i.exec(tag)?.[1];
    if (tagName?.toLowerCase() !== name.toLowerCase()) {
      continue;
    }
    const content = /\bcontent\s*=\s*"([^"]*)"|\bcontent\s*=\s*'([^']*)'/i.exec(tag);
    const value = content?.[1] ?? content?.[2];
    return value === undefined ? undefined : decodeEntities(value).trim();
  }
  return undefined;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

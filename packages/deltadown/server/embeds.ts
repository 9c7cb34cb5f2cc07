/**
 * Embeds: non-text inserts (images, videos, nostr URIs) and how they render
 * into Markdown.
 */

export const EMBED_KINDS = ['image', 'video', 'nostr'] as const;
export type EmbedKind = (typeof EMBED_KINDS)[number];

/** An embed insert, e.g. `{ image: "https://…/a.png" }`. Unknown kinds are allowed but render empty. */
export type Embed = { readonly [key: string]: unknown };

/** Strategy object: one renderer per known embed kind, plus an optional fallback. */
export interface EmbedRenderer {
  image(src: string): string;
  video(src: string): string;
  nostr(uri: string): string;
  unknown?(embed: Embed): string;
}

export type EmbedToMarkdown = EmbedRenderer | ((embed: Embed) => string);

export const defaultEmbedRenderer: EmbedRenderer = {
  image: (src) => `![](${src})`,
  video: (src) => src,
  nostr: (uri) => uri,
};

export function isEmbed(value: unknown): value is Embed {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First known kind carried by the embed, with its value as a string. */
export function embedKind(embed: Embed): { kind: EmbedKind; value: string } | null {
  for (const kind of EMBED_KINDS) {
    const value = embed[kind];
    if (value !== undefined && value !== null && value !== false && value !== '') {
      return { kind, value: String(value) };
    }
  }
  return null;
}

export function renderEmbed(embed: Embed, toMarkdown: EmbedToMarkdown = defaultEmbedRenderer): string {
  if (typeof toMarkdown === 'function') return toMarkdown(embed);

  const known = embedKind(embed);
  if (!known) return toMarkdown.unknown ? toMarkdown.unknown(embed) : '';

  switch (known.kind) {
    case 'image': return toMarkdown.image(known.value);
    case 'video': return toMarkdown.video(known.value);
    case 'nostr': return toMarkdown.nostr(known.value);
  }
}

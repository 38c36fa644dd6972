import type { Reference } from '@pagemill/model';

/**
 * Produces the Markdown URL of the `imageIndex`-th image region.
 */
export type ImageUrlResolver = (imageIndex: number, reference: Reference) => string;

export interface ParsedReferences {
  references: Reference[];
  markdown: string;
}

/**
 * One grounding segment: `<|ref|>type<|/ref|><|det|>[[x1,y1,x2,y2]]<|/det|>content`.
 * The bare `<ref>`/`<det>` dialect is accepted as well. Content runs up to the
 * next opening ref tag or the end of the input.
 */
const SEGMENT_PATTERN =
  /<\|?ref\|?>(\w+)<\|?\/ref\|?><\|?det\|?>(\[\[.*?\]\])<\|?\/det\|?>([\s\S]*?)(?=<\|?ref\|?>|$)/g;

const NUMBERED_ITEM_PATTERN = /^(\d+)\s/;

const defaultImageUrl: ImageUrlResolver = (imageIndex) =>
  `output/image_${imageIndex}.png`;

/**
 * Parse grounding OCR output into typed regions and render them as Markdown.
 *
 * Text outside of tagged segments is dropped. Image regions become
 * `![Image](url)` lines, numbered only among themselves so that the n-th
 * image line always belongs to the n-th image reference.
 */
export function parseReferences(
  rawText: string,
  imageUrlResolver: ImageUrlResolver = defaultImageUrl,
): ParsedReferences {
  const references: Reference[] = [];
  const blocks: string[] = [];
  let imageIndex = 0;

  for (const match of rawText.matchAll(SEGMENT_PATTERN)) {
    const [, type, detection, rawContent] = match;
    const reference: Reference = {
      type,
      boundingBox: parseBoundingBox(detection),
      content: rawContent.trim(),
    };
    references.push(reference);

    if (type === 'image') {
      blocks.push(`![Image](${imageUrlResolver(imageIndex, reference)})\n`);
      imageIndex++;
    } else {
      blocks.push(`${renderContent(reference)}\n`);
    }
  }

  return { references, markdown: blocks.join('\n') };
}

/**
 * Every run of digits in the detection payload, in order.
 * A malformed payload yields a short box rather than an error.
 */
export function parseBoundingBox(detection: string): number[] {
  return Array.from(detection.matchAll(/\d+/g), ([digits]) =>
    parseInt(digits, 10),
  );
}

function renderContent({ type, content }: Reference): string {
  switch (type) {
    case 'sub_title':
      return content.startsWith('#') ? content : `## ${content}`;
    case 'text':
      // "3 Item" is how the model writes a numbered list entry
      return content.replace(NUMBERED_ITEM_PATTERN, '$1. ');
    default:
      return content;
  }
}

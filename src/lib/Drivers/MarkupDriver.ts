import * as cheerio from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { Effect } from 'effect';
import { CellValue } from '../CellValue/CellValue.js';
import { ProcessingError } from '../errors.js';
import { traverseSource } from '../Scan/traverseSource.js';
import type { DriverOptions, ScanResults, SourceItem } from '../Scan/types.js';

/**
 * Which elements and attributes the markup driver reads.
 *
 * @example
 * ```typescript
 * // Anchors only, preferring data-href over href
 * const config: MarkupExtractorConfig = {
 *   tags: ['a'],
 *   attrs: ['data-href', 'href'],
 * };
 * ```
 *
 * @group Drivers
 * @public
 */
export interface MarkupExtractorConfig {
  /** Element names to read, matched in document order. */
  readonly tags?: readonly string[];
  /** Attributes in priority order; the first non-blank one wins. */
  readonly attrs?: readonly string[];
  /** Parse as XML rather than HTML. */
  readonly xml?: boolean;
}

/**
 * One element the extractor visited. `url` is undefined when none of the
 * configured attributes carried a value.
 */
export interface ExtractedLink {
  readonly tag: string;
  readonly url?: string;
}

export interface MarkupExtractionResult {
  readonly links: readonly ExtractedLink[];
  /** Number of URLs found per element name. */
  readonly extractionBreakdown: Readonly<Record<string, number>>;
}

export interface MarkupDriverOptions extends DriverOptions, MarkupExtractorConfig {}

const DEFAULT_CONFIG: Required<MarkupExtractorConfig> = {
  tags: ['a', 'img', 'link', 'script'],
  attrs: ['href', 'src'],
  xml: false,
};

/**
 * Reads candidate URLs out of an HTML or XML document without judging
 * them. Relative references, fragments and `javascript:` links all come
 * back as they are written.
 */
export const extractMarkupLinks = (
  markup: string,
  config: MarkupExtractorConfig = {}
): MarkupExtractionResult => {
  const finalConfig: Required<MarkupExtractorConfig> = {
    tags: config.tags ?? DEFAULT_CONFIG.tags,
    attrs: config.attrs ?? DEFAULT_CONFIG.attrs,
    xml: config.xml ?? DEFAULT_CONFIG.xml,
  };
  const $ = cheerio.load(markup, { xml: finalConfig.xml });
  const extractionBreakdown: Record<string, number> = {};

  const urlOf = (element: Element): string | undefined => {
    for (const attr of finalConfig.attrs) {
      const value = $(element).attr(attr);
      if (value && value.trim()) return value;
    }
    return undefined;
  };

  const links = $(finalConfig.tags.join(', '))
    .toArray()
    .filter(isTag)
    .map((element): ExtractedLink => {
      const tag = element.name.toLowerCase();
      const url = urlOf(element);
      if (url !== undefined) {
        extractionBreakdown[tag] = (extractionBreakdown[tag] ?? 0) + 1;
      }
      return { tag, url };
    });

  return { links, extractionBreakdown };
};

function* linkUnits(links: readonly ExtractedLink[]): Generator<SourceItem[]> {
  for (const [index, link] of links.entries()) {
    yield [
      {
        location: `${link.tag} element #${index + 1}`,
        cell:
          link.url === undefined
            ? CellValue.Missing()
            : CellValue.Text({ value: link.url }),
      },
    ];
  }
}

/**
 * Scans the link-bearing elements of a markup document. Every extracted
 * value goes straight to the validator, so `not-a-url` in an `href` is
 * reported as invalid even though the text classifier would have skipped
 * it.
 *
 * @example
 * ```typescript
 * const results = yield* scanMarkup('<a href="https://example.com">x</a>');
 * // results.valid -> ['https://example.com']
 * ```
 *
 * @group Drivers
 * @public
 */
export const scanMarkup = (
  content: string,
  options: MarkupDriverOptions = {}
): Effect.Effect<ScanResults, ProcessingError> =>
  Effect.gen(function* () {
    const { links, extractionBreakdown } = yield* Effect.try({
      try: () => extractMarkupLinks(content, options),
      catch: (cause) =>
        ProcessingError.fromCause('markup', cause, options.sourceName),
    });

    yield* Effect.logDebug('Extracted markup links').pipe(
      Effect.annotateLogs({ elements: links.length, ...extractionBreakdown })
    );

    return yield* traverseSource(
      { kind: 'markup', gate: 'validate', total: links.length, units: linkUnits(links) },
      options
    );
  });

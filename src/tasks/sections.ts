/**
 * Section-level document comparison.
 *
 * Splits legal documents on common heading patterns ("1.", "IV.", "(a)",
 * "Governing Law:") and classifies each section as added, removed or modified.
 * Only these changes are sent to the model, not both full documents.
 */

import { truncateText } from './definitions.js';

export interface DocumentSection {
  heading: string;
  text: string;
}

export type SectionChange =
  | { section: string; changeType: 'added'; text: string }
  | { section: string; changeType: 'removed'; text: string }
  | { section: string; changeType: 'modified'; fromText: string; toText: string };

/** Numbered/lettered headings take their whole line; titled ones end at the colon */
const SECTION_HEADING = /^(?:(?:[IVX]+\.|\d+\.|\([a-z]\))[^\n]*|[A-Z][A-Za-z ]*:)/gm;

const PREAMBLE = 'Preamble';

function normalize(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function extractSections(text: string): DocumentSection[] {
  const matches = [...text.matchAll(SECTION_HEADING)];
  const sections: DocumentSection[] = [];
  const seen = new Map<string, number>();

  const push = (heading: string, body: string): void => {
    const count = (seen.get(heading) ?? 0) + 1;
    seen.set(heading, count);
    sections.push({
      heading: count === 1 ? heading : `${heading} (${count})`,
      text: body.trim()
    });
  };

  const firstStart = matches[0]?.index ?? text.length;
  if (text.slice(0, firstStart).trim()) {
    push(PREAMBLE, text.slice(0, firstStart));
  }

  matches.forEach((match, i) => {
    const start = match.index ?? 0;
    const end = matches[i + 1]?.index ?? text.length;
    push(match[0].trim(), text.slice(start + match[0].length, end));
  });

  return sections;
}

/**
 * Compare two documents section by section.
 * Order: original sections first (removed/modified), then additions.
 */
export function compareSections(original: string, revised: string): SectionChange[] {
  const before = extractSections(original);
  const after = new Map(extractSections(revised).map(s => [s.heading, s.text]));
  const changes: SectionChange[] = [];

  for (const section of before) {
    const revisedText = after.get(section.heading);
    if (revisedText === undefined) {
      changes.push({ section: section.heading, changeType: 'removed', text: section.text });
    } else if (normalize(revisedText) !== normalize(section.text)) {
      changes.push({
        section: section.heading,
        changeType: 'modified',
        fromText: section.text,
        toText: revisedText
      });
    }
    after.delete(section.heading);
  }

  for (const [heading, text] of after) {
    changes.push({ section: heading, changeType: 'added', text });
  }

  return changes;
}

export interface BoundedChanges {
  changes: SectionChange[];

  /** Changes left out once the budget ran out */
  omitted: number;
}

/**
 * Fit changes into a prompt budget. Each section text is cut to
 * `maxSectionChars`; changes are kept in order until the serialized list would
 * pass `maxChars`. The first change is always kept.
 */
export function boundChanges(changes: SectionChange[], maxChars: number, maxSectionChars: number): BoundedChanges {
  const kept: SectionChange[] = [];
  let used = 0;

  for (const change of changes) {
    const bounded: SectionChange = change.changeType === 'modified'
      ? {
          ...change,
          fromText: truncateText(change.fromText, maxSectionChars),
          toText: truncateText(change.toText, maxSectionChars)
        }
      : { ...change, text: truncateText(change.text, maxSectionChars) };

    const size = JSON.stringify(bounded).length;
    if (kept.length > 0 && used + size > maxChars) {
      break;
    }
    kept.push(bounded);
    used += size;
  }

  return { changes: kept, omitted: changes.length - kept.length };
}

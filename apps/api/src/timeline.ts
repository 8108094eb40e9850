import type { LengthProfile, SectionName } from "@viralscript/schemas";

export type SectionSpan = {
  name: SectionName;
  start: number;
  end: number;
};

/** Integer end second of hook, setup, content and payoff. */
export function scaledBoundaries(length: LengthProfile): [number, number, number, number] {
  const { boundaries: b, total_seconds: total } = length;
  return [
    Math.round(b.hook * total),
    Math.round(b.setup * total),
    Math.round(b.content * total),
    Math.round(b.payoff * total),
  ];
}

/**
 * Contiguous spans covering [0, total_seconds]. Without a CTA the payoff
 * absorbs the final span.
 */
export function sectionSpans(length: LengthProfile, includeCta: boolean): SectionSpan[] {
  const total = length.total_seconds;
  const [hook, setup, content, payoff] = scaledBoundaries(length);
  const spans: SectionSpan[] = [
    { name: "hook", start: 0, end: hook },
    { name: "setup", start: hook, end: setup },
    { name: "content", start: setup, end: content },
    { name: "payoff", start: content, end: includeCta ? payoff : total },
  ];
  if (includeCta) spans.push({ name: "cta", start: payoff, end: total });
  return spans;
}

export function formatTimecode(span: SectionSpan): string {
  return `${span.start}-${span.end}s`;
}

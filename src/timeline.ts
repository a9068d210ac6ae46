// Presentation Analyzer - Timeline
//
// Merges pauses, scorer feedback and fixed-length content segments into one
// list sorted by time. The order depends only on the entries, never on the
// order scorers finished in.

import type {
  ContentSegment,
  MetricResult,
  Pause,
  TimelineEntry,
  TranscriptWord,
} from "./types.js";
import { findFillerOccurrences } from "./filler-detector.js";
import { FAST_WPM, SEGMENT_SEC, SLOW_WPM, segmentPace } from "./pace-scorer.js";

const FILLER_ISSUE_COUNT = 3;
const AWKWARD_ISSUE_COUNT = 2;

/**
 * Splits the recording into SEGMENT_SEC windows and tags each with its
 * dominant delivery issues and highlights.
 */
export function buildContentSegments(
  words: readonly TranscriptWord[],
  pauses: readonly Pause[],
  durationSec: number,
): ContentSegment[] {
  const fillers = findFillerOccurrences(words);

  return segmentPace(words, durationSec, SEGMENT_SEC).map((seg) => {
    const inWindow = (start: number) => start >= seg.start && start < seg.end;
    const fillerCount = fillers.filter((f) => inWindow(f.start)).length;
    const windowPauses = pauses.filter((p) => inWindow(p.start_sec));
    const awkward = windowPauses.filter((p) => p.context === "awkward").length;
    const helpful = windowPauses.length - awkward;

    const issues: string[] = [];
    const highlights: string[] = [];

    if (fillerCount >= FILLER_ISSUE_COUNT) issues.push("filler_words");
    if (awkward >= AWKWARD_ISSUE_COUNT) issues.push("awkward_pauses");
    if (seg.wordCount > 0) {
      if (seg.wpm > FAST_WPM) issues.push("fast_pace");
      else if (seg.wpm < SLOW_WPM) issues.push("slow_pace");
      else highlights.push("steady_pace");
      if (fillerCount === 0) highlights.push("no_fillers");
    }
    if (helpful > 0 && awkward === 0) highlights.push("well_placed_pauses");

    return {
      start_sec: seg.start,
      end_sec: seg.end,
      dominant_issues: issues,
      highlights,
    };
  });
}

function kindRank(entry: TimelineEntry): number {
  if (!("type" in entry)) return 0;
  return entry.type === "pause" ? 1 : 2;
}

function tieBreaker(entry: TimelineEntry): string {
  if (!("type" in entry)) return "";
  if (entry.type === "pause") return entry.source;
  return `${entry.metric}\u0000${entry.message}`;
}

export function compareTimelineEntries(a: TimelineEntry, b: TimelineEntry): number {
  return (
    a.start_sec - b.start_sec ||
    a.end_sec - b.end_sec ||
    kindRank(a) - kindRank(b) ||
    (tieBreaker(a) < tieBreaker(b) ? -1 : tieBreaker(a) > tieBreaker(b) ? 1 : 0)
  );
}

export function buildTimeline(
  pauses: readonly Pause[],
  metrics: Record<string, MetricResult>,
  segments: readonly ContentSegment[],
): TimelineEntry[] {
  const entries: TimelineEntry[] = [
    ...segments,
    ...pauses.map((p): TimelineEntry => ({ type: "pause", ...p })),
    ...Object.values(metrics).flatMap((m) =>
      m.feedback.map((f): TimelineEntry => ({ type: "feedback", ...f })),
    ),
  ];
  return entries.sort(compareTimelineEntries);
}

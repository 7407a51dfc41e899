import type { StatusResponse } from '@minutes-pipeline/shared';

// Downstream readers locate transcript text by these literal markers. Do not reword.
export const MARKERS = {
  TRANSCRIPT: 'TRANSCRIPT CONTENT:',
  WORD_TIMESTAMPS: 'WORD-LEVEL TIMESTAMPS:',
  SPEAKERS: 'SPEAKER INFORMATION:',
  SUMMARY: 'AUTO-GENERATED SUMMARY:',
  FINAL_HEADER: 'FINAL TRANSCRIPTION COMPLETE',
  FINAL_TRANSCRIPT: 'FINAL COMPLETE TRANSCRIPT:'
} as const;

export const POLL_SEPARATOR = '-'.repeat(60);
export const HEAVY_RULE = '='.repeat(80);

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

const pad = (n: number) => String(n).padStart(2, '0');

/** HH:MM:SS in local time */
export function formatClockTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** e.g. "March 04, 2026 at 02:05 PM" */
export function formatLongDate(date: Date): string {
  const hours = date.getHours() % 12 || 12;
  const meridiem = date.getHours() < 12 ? 'AM' : 'PM';
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())}, ${date.getFullYear()} at ${pad(hours)}:${pad(date.getMinutes())} ${meridiem}`;
}

export function formatLogHeader(title: string, generatedAt: Date): string {
  return `FULL TRANSCRIPT - ${title}\n` +
    `Generated: ${formatLongDate(generatedAt)}\n` +
    `${HEAVY_RULE}\n\n`;
}

/**
 * One block per poll. Sections the response does not carry are left out.
 */
export function formatPollBlock(pollNumber: number, snapshot: StatusResponse, observedAt: Date): string {
  const lines: string[] = [
    `POLL #${pollNumber} - Status: ${snapshot.status ?? ''}`,
    `Timestamp: ${formatClockTime(observedAt)}`
  ];

  if (snapshot.remaining_seconds !== undefined) {
    lines.push(`Remaining seconds: ${snapshot.remaining_seconds}`);
  }

  if (snapshot.transcript !== undefined) {
    lines.push(MARKERS.TRANSCRIPT, snapshot.transcript);
  }

  if (snapshot.word_time_offsets) {
    lines.push('', MARKERS.WORD_TIMESTAMPS);
    for (const word of snapshot.word_time_offsets) {
      const start = (word.start_time ?? 0).toFixed(2);
      const end = (word.end_time ?? 0).toFixed(2);
      const confidence = (word.confidence ?? 0).toFixed(3);
      lines.push(`[${start}s-${end}s] ${word.word ?? ''} (conf: ${confidence})`);
    }
  }

  if (snapshot.speakers) {
    lines.push('', MARKERS.SPEAKERS);
    for (const speaker of snapshot.speakers) {
      lines.push(`Speaker: ${JSON.stringify(speaker, null, 2)}`);
    }
  }

  if (snapshot.summary !== undefined) {
    lines.push('', MARKERS.SUMMARY, snapshot.summary);
  }

  return `${lines.join('\n')}\n\n${POLL_SEPARATOR}\n\n`;
}

export function formatFinalBlock(transcript: string): string {
  return `${MARKERS.FINAL_HEADER}\n${HEAVY_RULE}\n${MARKERS.FINAL_TRANSCRIPT}\n${transcript}\n\n`;
}

const SECTION_ENDINGS = [
  `\n${MARKERS.WORD_TIMESTAMPS}`,
  `\n${MARKERS.SPEAKERS}`,
  `\n${MARKERS.SUMMARY}`,
  `\n${POLL_SEPARATOR}`
];

/**
 * Pulls the transcript back out of a snapshot log.
 * Prefers the text after the last final marker; otherwise the first
 * TRANSCRIPT CONTENT section, cut at the next section or separator.
 */
export function extractTranscript(logText: string): string | undefined {
  const finalIndex = logText.lastIndexOf(MARKERS.FINAL_TRANSCRIPT);
  if (finalIndex !== -1) {
    return logText.slice(finalIndex + MARKERS.FINAL_TRANSCRIPT.length).trim();
  }

  const contentIndex = logText.indexOf(MARKERS.TRANSCRIPT);
  if (contentIndex === -1) return undefined;

  const section = logText.slice(contentIndex + MARKERS.TRANSCRIPT.length);
  const cut = SECTION_ENDINGS
    .map(ending => section.indexOf(ending))
    .filter(index => index !== -1);

  return (cut.length > 0 ? section.slice(0, Math.min(...cut)) : section).trim();
}

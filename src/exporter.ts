// src/exporter.ts
import type { PostRecord } from "./records";

export const EXPORT_FORMATS = ["json", "csv", "txt"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type ExportFile = { filename: string; contentType: string; body: string };

export function isExportFormat(v: unknown): v is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === v);
}

const POST_COLUMNS = [
  "id",
  "user_id",
  "date",
  "topic",
  "purpose",
  "audience",
  "message",
  "tone_intensity",
  "language_style",
  "post_length",
  "formatting",
  "cta",
  "post_goal",
  "template_type",
  "visual_style",
  "generated_post",
] as const;

/** RFC 4180 field quoting. */
export function csvCell(v: string | number | boolean | null | undefined): string {
  const s = v === null || v === undefined ? "" : String(v);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv(header: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number | null | undefined>>): string {
  return [header, ...rows].map((r) => r.map(csvCell).join(",")).join("\r\n") + "\r\n";
}

export function postsToCsv(posts: PostRecord[]): string {
  return toCsv(
    POST_COLUMNS,
    posts.map((p) => POST_COLUMNS.map((c) => p[c]))
  );
}

export function postsToText(posts: PostRecord[]): string {
  const rule = "=".repeat(50);
  return posts
    .map((p) =>
      [
        rule,
        `Date: ${p.date}`,
        `Topic: ${p.topic}`,
        `Goal: ${p.post_goal} | Length: ${p.post_length}`,
        rule,
        "",
        p.generated_post,
        "",
      ].join("\n")
    )
    .join("\n");
}

/** Post history in one of the download formats; `stamp` goes into the filename. */
export function exportPosts(posts: PostRecord[], format: ExportFormat, stamp: string): ExportFile {
  const base = `linkedin_posts_${stamp}`;
  switch (format) {
    case "json":
      return { filename: `${base}.json`, contentType: "application/json", body: JSON.stringify(posts, null, 2) };
    case "csv":
      return { filename: `${base}.csv`, contentType: "text/csv; charset=utf-8", body: postsToCsv(posts) };
    case "txt":
      return { filename: `${base}.txt`, contentType: "text/plain; charset=utf-8", body: postsToText(posts) };
  }
}

/** Local time as YYYYMMDD_HHMMSS. */
export function fileStamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`;
}

// src/templates.ts
import { z } from "zod";
import raw from "./data/templates.json";

const Template = z.object({
  name: z.string(),
  description: z.string(),
  system_prompt: z.string(),
  formatting_style: z.string(),
});

const Industry = z.object({
  name: z.string(),
  keywords: z.array(z.string()),
  tone: z.string(),
  audience: z.string(),
});

const Tables = z.object({
  templates: z.record(z.string(), Template),
  template_visuals: z.record(z.string(), z.string()),
  image_styles: z.record(z.string(), z.string()),
  goal_palettes: z.record(z.string(), z.string()),
  lengths: z.record(z.string(), z.string()),
  tones: z.record(z.string(), z.string()),
  formats: z.record(z.string(), z.string()),
  industries: z.record(z.string(), Industry),
  form_options: z.object({
    audiences: z.array(z.string()),
    goals: z.array(z.string()),
    language_styles: z.array(z.string()),
  }),
});

export type Template = z.infer<typeof Template>;
export type Industry = z.infer<typeof Industry>;
export type StyleTables = z.infer<typeof Tables>;

export const TABLES: StyleTables = Tables.parse(raw);

export const DEFAULT_TEMPLATE_KEY = "professional";
export const DEFAULT_VISUAL_STYLE = "photo_realistic";
export const DEFAULT_INDUSTRY_KEY = "technology";

export const FALLBACKS = {
  templateVisual: "professional, clean, modern",
  imageStyle: "photorealistic, high-resolution photography",
  palette: "professional, clean",
  length: "800-1,500 characters",
  tone: "professional and engaging",
  format: "Use a clear, structured format.",
} as const;

function lookup(table: Record<string, string>, key: string | undefined, fallback: string): string {
  return key !== undefined && Object.prototype.hasOwnProperty.call(table, key) ? table[key] : fallback;
}

/** Unknown keys resolve to the professional persona. */
export function getTemplate(key: string | undefined): { key: string; template: Template } {
  const k = key !== undefined && Object.prototype.hasOwnProperty.call(TABLES.templates, key) ? key : DEFAULT_TEMPLATE_KEY;
  return { key: k, template: TABLES.templates[k] };
}

export function getIndustry(key: string | undefined): Industry {
  const k = key !== undefined && Object.prototype.hasOwnProperty.call(TABLES.industries, key) ? key : DEFAULT_INDUSTRY_KEY;
  return TABLES.industries[k];
}

export const templateVisual = (key: string | undefined) => lookup(TABLES.template_visuals, key, FALLBACKS.templateVisual);
export const imageStyle = (key: string | undefined) => lookup(TABLES.image_styles, key, FALLBACKS.imageStyle);
export const goalPalette = (key: string | undefined) => lookup(TABLES.goal_palettes, key, FALLBACKS.palette);
export const lengthGuidance = (key: string | undefined) => lookup(TABLES.lengths, key, FALLBACKS.length);
export const toneGuidance = (key: string | undefined) => lookup(TABLES.tones, key, FALLBACKS.tone);
export const formatGuidance = (key: string | undefined) => lookup(TABLES.formats, key, FALLBACKS.format);

/** What a form needs to render its dropdowns. */
export function formCatalog() {
  return {
    templates: Object.entries(TABLES.templates).map(([key, t]) => ({ key, name: t.name, description: t.description })),
    visual_styles: Object.keys(TABLES.image_styles).map((key) => ({
      key,
      name: key
        .split("_")
        .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
        .join(" "),
    })),
    industries: Object.entries(TABLES.industries).map(([key, i]) => ({ key, ...i })),
    audiences: TABLES.form_options.audiences,
    goals: TABLES.form_options.goals,
    language_styles: TABLES.form_options.language_styles,
    tone_intensities: Object.keys(TABLES.tones),
    post_lengths: Object.keys(TABLES.lengths),
    formatting: Object.keys(TABLES.formats),
  };
}

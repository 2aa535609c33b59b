// src/prompts.ts
import {
  formatGuidance,
  getTemplate,
  goalPalette,
  imageStyle,
  lengthGuidance,
  templateVisual,
  toneGuidance,
  type Template,
} from "./templates";

export const LINKEDIN_MAX_CHARS = 3000;

export type PostRequest = {
  topic: string;
  purpose: string;
  audience: string;
  message: string;
  toneIntensity: string;
  languageStyle: string;
  postLength: string;
  formatting: string;
  cta: string;
  postGoal: string;
  templateType: string;
  visualStyle: string;
};

export type BuiltPrompt = {
  system: string;
  user: string;
  characterGuidance: string;
  templateKey: string;
  template: Template;
};

export function buildPostPrompt(req: PostRequest): BuiltPrompt {
  const { key, template } = getTemplate(req.templateType);
  const characterGuidance = lengthGuidance(req.postLength);
  const cta = req.cta.trim();
  const ctaInstruction = cta
    ? `Include a clear call-to-action: ${cta}`
    : "End with an engaging call-to-action that encourages interaction (questions, comments, or shares).";

  const user = `
Create a compelling ${template.name.toLowerCase()} LinkedIn post about: ${req.topic}

CONTEXT:
- Purpose: ${req.purpose}
- Target Audience: ${req.audience}
- Key Message: ${req.message}
- Post Goal: ${req.postGoal}

STYLE REQUIREMENTS:
- Tone: ${toneGuidance(req.toneIntensity)} with a ${req.languageStyle.toLowerCase()} language style
- Length: ${characterGuidance} (LinkedIn maximum: 3,000 characters)
- Format: ${formatGuidance(req.formatting)}

CONTENT GUIDELINES:
${template.formatting_style}

- Start with a hook that grabs attention (question, bold statement, or relatable scenario)
- Develop the main message clearly and concisely
- Use LinkedIn-optimized formatting:
  • Strategic CAPITALIZATION for emphasis on key points
  • Relevant emojis (2-4 max) to enhance readability and engagement
  • Clear line breaks between sections for easy scanning
  • Short paragraphs (2-3 sentences max) for mobile readability
- ${ctaInstruction}

QUALITY STANDARDS:
- Professional yet approachable
- Actionable insights or value
- Authentic voice that resonates with ${req.audience.toLowerCase()}
- Engaging and shareable content
- No hashtags unless specifically requested

CRITICAL: The post must be exactly within ${characterGuidance}. Do not exceed 3,000 characters total.
`.trim();

  return { system: template.system_prompt, user, characterGuidance, templateKey: key, template };
}

/**
 * Illustration brief for an external image model. Colour comes only from the
 * goal palette; the template contributes composition and mood.
 */
export function buildImagePrompt(
  req: Pick<PostRequest, "topic" | "purpose" | "audience" | "postGoal" | "templateType" | "visualStyle">
): string {
  const { key } = getTemplate(req.templateType);
  const composition = templateVisual(key);
  const style = imageStyle(req.visualStyle);
  const palette = goalPalette(req.postGoal);

  return `
Create a LinkedIn post image for: ${req.topic}

Purpose: ${req.purpose}
Audience: ${req.audience}
Goal: ${req.postGoal}

Template Style: ${composition}
Image Type: ${style}
Color Palette: ${palette} (overrides any colors implied by the template style)

Image Requirements:
- LinkedIn-optimized (1200x627px recommended)
- Professional quality
- Text overlay friendly
- High contrast for readability
- Brand-appropriate

Final Style: ${style} with ${composition} approach
`.trim();
}

import type { Persona } from "../chat-types.js";

export const DEFAULT_PERSONA_NAME = "General Assistant";

const PERSONA_ENTRIES: Persona[] = [
  {
    name: "General Assistant",
    kind: "text",
    instruction: "You are a helpful digital marketing assistant.",
  },
  {
    name: "Ad Copy Generator",
    kind: "text",
    instruction:
      "You are an expert copywriter. Your task is to create compelling ad copy based on the user's request. Focus on headlines, body text, and calls-to-action.",
  },
  {
    name: "Social Media Post Generator",
    kind: "text",
    instruction:
      "You are a social media manager. Create engaging posts for the specified platform, including relevant hashtags and a suitable tone.",
  },
  {
    name: "Email Campaign Writer",
    kind: "text",
    instruction:
      "You are an email marketing specialist. Write effective marketing emails with strong subject lines and clear calls-to-action.",
  },
  {
    name: "SEO Keyword Analyst",
    kind: "text",
    instruction: "You are an SEO expert. Generate relevant short-tail and long-tail keywords for the user's topic.",
  },
  {
    name: "Content Improver",
    kind: "text",
    instruction:
      "You are an expert content editor. Rewrite and improve the user's text based on their stated goal (e.g., make it more persuasive, simplify it).",
  },
  {
    name: "Digital Marketing Analyst",
    kind: "text",
    instruction:
      "You are a digital marketing analyst. Your role is to analyze data, summarize reports, and provide actionable insights.",
  },
  {
    name: "Image Generator",
    kind: "image",
    instruction: "You create marketing visuals from the user's description.",
  },
];

const PERSONA_CATALOG: readonly Persona[] = Object.freeze(
  PERSONA_ENTRIES.map((persona) => Object.freeze(persona)),
);

export function listPersonas(): readonly Persona[] {
  return PERSONA_CATALOG;
}

export function listPersonaNames(): string[] {
  return PERSONA_CATALOG.map((persona) => persona.name);
}

export function getPersona(name: string): Persona | undefined {
  const normalized = name.trim();
  return PERSONA_CATALOG.find((persona) => persona.name === normalized);
}

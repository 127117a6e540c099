// utils/personas.ts
import { z } from 'zod';
import personaData from '../data/personas.json';
import { IPersonaTemplate, Persona, PERSONAS, isPersona } from '../types';

const templateSchema = z.object({
  label: z.string().min(1),
  voice: z.string().min(1),
  articleIntro: z.string().min(1),
  bulletin: z.string().min(1),
  newsletterIntro: z.string().min(1),
  newsletterConclusion: z.string().min(1),
});

const tableSchema = z.object({
  default: templateSchema,
  personas: z.record(templateSchema),
});

export interface PersonaTable {
  defaultTemplate: IPersonaTemplate;
  templates: Map<Persona, IPersonaTemplate>;
}

// Unknown persona keys in the data file are ignored; missing ones fall back to the default entry.
export const buildPersonaTable = (raw: unknown): PersonaTable => {
  const parsed = tableSchema.parse(raw);
  const templates = new Map<Persona, IPersonaTemplate>();
  for (const [key, template] of Object.entries(parsed.personas)) {
    if (isPersona(key)) templates.set(key, template);
  }
  return { defaultTemplate: parsed.default, templates };
};

export const personaTable: PersonaTable = buildPersonaTable(personaData);

export const getPersonaTemplate = (persona: string | undefined, table: PersonaTable = personaTable): IPersonaTemplate => {
  if (persona && isPersona(persona)) {
    return table.templates.get(persona) ?? table.defaultTemplate;
  }
  return table.defaultTemplate;
};

export const DEFAULT_PERSONA: Persona = PERSONAS[0];

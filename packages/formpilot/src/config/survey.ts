import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { FormPilotError, errorMessage } from '../errors.js';

// ── Survey definition ────────────────────────────────────────────────────
// Question wording and ordering are static configuration. The participant
// block maps UserRecord fields onto text inputs; later sections are radio
// pages filled either by a random sweep or from a generated AnswerSet.

export const UserRecordFieldSchema = z.enum([
  'displayName',
  'email',
  'ageYears',
  'cityState',
  'heightCm',
  'weightKg',
]);

export type UserRecordField = z.infer<typeof UserRecordFieldSchema>;

export const TextFieldDefinitionSchema = z.object({
  label: z.string().min(1),
  source: UserRecordFieldSchema,
  suffix: z.string().optional(),
});

export type TextFieldDefinition = z.infer<typeof TextFieldDefinitionSchema>;

export const SectionFillModeSchema = z.enum(['sweep', 'answers']);
export type SectionFillMode = z.infer<typeof SectionFillModeSchema>;

export const SurveySectionSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  mode: SectionFillModeSchema.default('sweep'),
  scale: z.string().min(1),
  questions: z.array(z.string().min(1)).min(1),
});

export type SurveySection = z.infer<typeof SurveySectionSchema>;

export const ScaleOptionSchema = z.union([z.number().int(), z.string().min(1)]);

export const NavigationDefinitionSchema = z.object({
  nextButtonText: z.string().min(1),
  submitButtonTexts: z.array(z.string().min(1)).min(1),
  submitFallbackSelector: z.string().min(1),
  confirmationPhrases: z.array(z.string().min(1)).min(1),
  responseUrlMarker: z.string().min(1),
});

export type NavigationDefinition = z.infer<typeof NavigationDefinitionSchema>;

export const SurveyDefinitionSchema = z
  .object({
    title: z.string().min(1),
    participant: z.object({
      consentLabel: z.string().min(1),
      textFields: z.array(TextFieldDefinitionSchema).min(1),
      genderLabel: z.string().min(1),
    }),
    sections: z.array(SurveySectionSchema),
    scales: z.record(z.array(ScaleOptionSchema).min(1)),
    cities: z.array(z.string().min(1)).min(1),
    emailDomains: z.array(z.string().min(1)).min(1),
    navigation: NavigationDefinitionSchema,
  })
  .superRefine((survey, ctx) => {
    survey.sections.forEach((section, i) => {
      if (!(section.scale in survey.scales)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sections', i, 'scale'],
          message: `Unknown scale '${section.scale}'`,
        });
      }
    });
  });

export type SurveyDefinition = z.infer<typeof SurveyDefinitionSchema>;

export const DEFAULT_SURVEY_PATH = fileURLToPath(new URL('../../data/survey.json', import.meta.url));

export function parseSurveyDefinition(raw: unknown): SurveyDefinition {
  const result = SurveyDefinitionSchema.safeParse(raw);
  if (!result.success) {
    throw new FormPilotError(
      `Invalid survey definition: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      'invalid_survey_definition',
      result.error.issues,
    );
  }
  return result.data;
}

export function loadSurveyDefinition(path: string = DEFAULT_SURVEY_PATH): SurveyDefinition {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new FormPilotError(
      `Could not read survey definition at ${path}: ${errorMessage(err)}`,
      'invalid_survey_definition',
    );
  }
  return parseSurveyDefinition(raw);
}

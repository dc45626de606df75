import type { SurveyDefinition } from '../config/survey.js';
import { pickOne, randomInt, randomString, type RandomSource } from './random.js';

export type Gender = 'Female' | 'Male';

export const GENDERS: readonly Gender[] = ['Female', 'Male'];

export const USER_RECORD_BOUNDS = {
  ageYears: { min: 16, max: 25 },
  heightCm: { min: 150, max: 195 },
  weightKg: { min: 45, max: 100 },
  emailLocalPartLength: { min: 5, max: 10 },
} as const;

export interface UserRecord {
  readonly displayName: string;
  readonly email: string;
  readonly ageYears: number;
  readonly gender: Gender;
  readonly cityState: string;
  readonly heightCm: number;
  readonly weightKg: number;
}

export type QuestionLabel = string;
export type ScaleAnswer = number | string;
export type AnswerSet = ReadonlyMap<QuestionLabel, ScaleAnswer>;

/** Everything one submission needs, generated fresh and owned by that run. */
export interface SubmissionPlan {
  readonly index: number;
  readonly user: UserRecord;
  /** Keyed by survey section id */
  readonly answers: ReadonlyMap<string, AnswerSet>;
}

const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';

export interface UserRecordPools {
  cities: readonly string[];
  emailDomains: readonly string[];
}

export function generateUserRecord(random: RandomSource, pools: UserRecordPools): UserRecord {
  const { ageYears, heightCm, weightKg, emailLocalPartLength } = USER_RECORD_BOUNDS;

  const displayName = randomString(random, UPPERCASE, 2);
  const localPart = randomString(
    random,
    LOWERCASE,
    randomInt(random, emailLocalPartLength.min, emailLocalPartLength.max),
  );

  return Object.freeze({
    displayName,
    email: `${localPart}@${pickOne(random, pools.emailDomains)}`,
    ageYears: randomInt(random, ageYears.min, ageYears.max),
    gender: pickOne(random, GENDERS),
    cityState: pickOne(random, pools.cities),
    heightCm: randomInt(random, heightCm.min, heightCm.max),
    weightKg: randomInt(random, weightKg.min, weightKg.max),
  });
}

/** One uniformly drawn option per question, in question order. */
export function generateAnswerSet(
  random: RandomSource,
  questions: readonly QuestionLabel[],
  options: readonly ScaleAnswer[],
): AnswerSet {
  return new Map(questions.map((q) => [q, pickOne(random, options)] as const));
}

export function generateSubmissionPlan(
  survey: SurveyDefinition,
  random: RandomSource,
  index: number,
): SubmissionPlan {
  const user = generateUserRecord(random, survey);
  const answers = new Map<string, AnswerSet>();
  for (const section of survey.sections) {
    answers.set(section.id, generateAnswerSet(random, section.questions, survey.scales[section.scale] ?? []));
  }
  return { index, user, answers };
}

export type {
  BrowserDriver,
  DriverElement,
  DriverLaunchOptions,
  DriverScrollOptions,
  DriverType,
  ElementQuery,
  QueryRole,
} from './types.js';
export { describeQuery } from './types.js';
export { PlaywrightDriver, isInterceptionError } from './playwright.js';
export {
  MockDriver,
  MockElement,
  type MockDriverConfig,
  type MockSection,
  type MockQuestion,
  type MockClickBehavior,
  type MockControl,
} from './mock.js';

import type { SurveyDefinition } from '../config/survey.js';
import { MockDriver, type MockDriverConfig, type MockSection } from './mock.js';
import { PlaywrightDriver } from './playwright.js';
import type { BrowserDriver, DriverType } from './types.js';

/** Fake sections that mirror a survey definition, for dry runs. */
export function mockSectionsForSurvey(survey: SurveyDefinition): MockSection[] {
  const participant: MockSection = {
    questions: [
      { label: survey.participant.consentLabel, control: 'checkbox' },
      ...survey.participant.textFields.map((field) => ({
        label: field.label,
        control: field.source === 'email' ? ('email' as const) : ('text' as const),
      })),
      { label: survey.participant.genderLabel, control: 'radio', options: ['Female', 'Male'] },
    ],
  };
  const rest = survey.sections.map((section) => ({
    questions: section.questions.map((label) => ({
      label,
      control: 'radio' as const,
      options: (survey.scales[section.scale] ?? []).map(String),
    })),
  }));
  return [participant, ...rest];
}

export interface CreateDriverOptions {
  /** Survey the mock driver renders when no explicit mock config is given */
  survey?: SurveyDefinition;
  mock?: MockDriverConfig;
}

export function createDriver(type: DriverType = 'playwright', options: CreateDriverOptions = {}): BrowserDriver {
  switch (type) {
    case 'playwright':
      return new PlaywrightDriver();
    case 'mock': {
      if (options.mock) return new MockDriver(options.mock);
      if (!options.survey) {
        throw new Error('Mock driver needs a survey definition or an explicit mock config');
      }
      return new MockDriver({ sections: mockSectionsForSurvey(options.survey) });
    }
    default:
      throw new Error(`Unknown driver type: ${String(type)}`);
  }
}

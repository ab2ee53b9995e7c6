import { type AppConfig, loadConfig } from '../../config/app-config';

export const TEST_ENV = {
  OPENAI_API_KEY: 'test-key',
  VECTOR_STORE_ID: 'vs_test',
  ASSISTANT_ID: 'asst_test',
} as const;

export function createTestConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

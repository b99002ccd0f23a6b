export const APP_DEFAULTS = {
  port: 8000,
  databaseUrl: 'mongodb://localhost:27017',
  databaseName: 'edusense',
  llmModel: 'gpt-4o-mini',
  llmBaseUrl: 'https://api.openai.com/v1',
  llmTimeoutMs: 0,
};

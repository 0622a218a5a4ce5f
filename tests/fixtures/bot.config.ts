import type { BotConfigInput } from '@core';

const config: BotConfigInput = {
  tokens: { discord: 'test-secret' },
  bot: { name: 'FixtureBot' },
  plugins: ['media'],
};

export default config;

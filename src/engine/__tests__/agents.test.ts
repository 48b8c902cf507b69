import { describe, expect, it } from 'vitest';
import { FakeLlmService } from '../../__tests__/helpers/index.js';
import { LlmAdvisoryAgent, MockAdvisoryAgent, parseFollowUps } from '../agents.js';
import { isEngineError } from '../engine_error.js';

describe('parseFollowUps', () => {
  it('strips list markers and keeps at most three questions', () => {
    expect(parseFollowUps('1. Is staking halal?\n- What is gharar?\n\n* Why?\n4) Extra?')).toEqual([
      'Is staking halal?',
      'What is gharar?',
      'Why?',
    ]);
  });
});

describe('MockAdvisoryAgent', () => {
  it('answers token analyses from templates', async () => {
    const answer = await new MockAdvisoryAgent().analyzeToken('ETH');

    expect(answer.text.startsWith('**ETH Analysis**')).toBe(true);
    expect(answer.confidence).toBe(0.8);
    expect(answer.followUps).toEqual(['Is staking ETH permissible?', 'Which tokens are considered halal?']);
  });

  it('echoes chat messages', async () => {
    const answer = await new MockAdvisoryAgent().chat('Is gold halal?');

    expect(answer.text).toBe("Thank you for your question: 'Is gold halal?'. I will analyze this based on Islamic principles.");
  });
});

describe('LlmAdvisoryAgent', () => {
  it('asks the provider and then for follow-ups', async () => {
    const llm = new FakeLlmService(['SOL is generally permissible.', '1. Is staking SOL halal?\n2. What about DeFi?']);
    const agent = new LlmAdvisoryAgent({ provider: 'groq', llm });

    const answer = await agent.analyzeToken('SOL', { language: 'ar' });

    expect(agent.name).toBe('Groq Agent');
    expect(answer).toEqual({
      text: 'SOL is generally permissible.',
      confidence: 0.9,
      sources: ['Islamic Finance Analysis', 'Groq AI'],
      followUps: ['Is staking SOL halal?', 'What about DeFi?'],
    });
    expect(llm.calls).toHaveLength(2);
    expect(llm.calls[0]?.system.endsWith('Answer in language "ar".')).toBe(true);
    expect(llm.calls[0]?.user.startsWith('Analyze the cryptocurrency token SOL')).toBe(true);
  });

  it('keeps the answer when follow-up generation fails', async () => {
    const llm = new FakeLlmService(['Riba is interest.', new Error('rate limited')]);
    const agent = new LlmAdvisoryAgent({ provider: 'openai', llm });

    const answer = await agent.answer('What is riba?', { language: 'en' });

    expect(answer.followUps).toEqual([]);
    expect(answer.sources).toEqual(['Islamic Finance Knowledge', 'OpenAI AI']);
  });

  it('raises provider failures as engine errors', async () => {
    const agent = new LlmAdvisoryAgent({ provider: 'grok', llm: new FakeLlmService([new Error('HTTP 500')]) });

    const failure = await agent.chat('hello', { language: 'en' }).catch((error: unknown) => error);

    expect(isEngineError(failure)).toBe(true);
    if (isEngineError(failure)) {
      expect(failure.code).toBe('ai_error');
      expect(failure.message).toBe('HTTP 500');
    }
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConversationTurn } from '../database/models/Conversation.js';

const { getHistory, updateContext, recordQuery } = vi.hoisted(() => ({
  getHistory: vi.fn(),
  updateContext: vi.fn(),
  recordQuery: vi.fn(),
}));

vi.mock('../database/index.js', () => ({
  database: {
    getConversationModel: () => ({ getHistory }),
    getUserContextModel: () => ({ updateContext, recordQuery }),
  },
}));

import {
  ContextService,
  computeConfidence,
  detectIntent,
  extractSubject,
} from './context.service.js';

const turn = (sender: 'user' | 'bot', text: string): ConversationTurn => ({
  userTelegramId: 42,
  chatTelegramId: 42,
  sender,
  text,
  messageType: 'text',
  sentAt: new Date('2024-03-01T10:00:00Z'),
});

describe('detectIntent', () => {
  it.each([
    ['Physics ke notes bhejo', 'file_request'],
    ['mujhe ek quiz chahiye', 'quiz_request'],
    ['Ye problem solve karo', 'doubt_solving'],
    ['All the best for exams', 'best_wishes'],
    ['thank you didi', 'thanks'],
    ['hello Vidya', 'greeting'],
    ['what is the weather', 'general'],
  ])('classifies "%s" as %s', (text, intent) => {
    expect(detectIntent(text)).toBe(intent);
  });

  it('prefers earlier intents when several match', () => {
    expect(detectIntent('hi, explain photosynthesis')).toBe('doubt_solving');
  });

  it('falls back to keywords', () => {
    expect(detectIntent('mere pdfs kaha hai')).toBe('file_request');
    expect(detectIntent('kal test hai')).toBe('quiz_request');
  });
});

describe('extractSubject', () => {
  it('reads the subject from the current text', () => {
    expect(extractSubject('integration kaise kare', [])).toBe('math');
  });

  it('matches keywords only at word start', () => {
    expect(extractSubject('aftermath of war', [])).toBe('general');
  });

  it('checks the latest history turns newest first', () => {
    const history = [turn('user', 'newton ke laws'), turn('user', 'organic reactions'), turn('bot', 'ok')];
    expect(extractSubject('aur batao', history)).toBe('chemistry');
  });

  it('ignores turns older than the last three', () => {
    const history = [turn('user', 'algebra'), turn('bot', 'ok'), turn('user', 'hmm'), turn('bot', 'ok')];
    expect(extractSubject('aur batao', history)).toBe('general');
  });
});

describe('computeConfidence', () => {
  it('adds up the signals', () => {
    expect(computeConfidence('quiz_request', 'math', 'make a quiz on algebra please')).toBe(1);
    expect(computeConfidence('general', 'general', 'hmm')).toBe(0.5);
    expect(computeConfidence('greeting', 'general', 'hello there friend yaar')).toBe(0.8);
  });
});

describe('ContextService', () => {
  beforeEach(() => {
    getHistory.mockReset().mockResolvedValue([]);
    updateContext.mockReset().mockResolvedValue(undefined);
    recordQuery.mockReset().mockResolvedValue(undefined);
  });

  it('analyzes and stores the user context', async () => {
    const service = new ContextService();

    const analysis = await service.analyze(42, 'physics ka doubt hai');

    expect(analysis).toEqual({ intent: 'doubt_solving', subject: 'physics', confidence: 1 });
    expect(getHistory).toHaveBeenCalledWith(42, 5);
    expect(updateContext).toHaveBeenCalledWith(42, {
      lastIntent: 'doubt_solving',
      lastSubject: 'physics',
      currentTopic: 'physics',
    });
    expect(recordQuery).toHaveBeenCalledWith(42, 'physics ka doubt hai');
  });

  it('keeps the current topic for general messages', async () => {
    await new ContextService().analyze(7, 'hello');

    expect(updateContext).toHaveBeenCalledWith(7, { lastIntent: 'greeting', lastSubject: 'general' });
  });

  it('builds canned replies', () => {
    const first = new ContextService(() => 0);
    const last = new ContextService(() => 0.99);

    expect(first.buildContextualReply({ intent: 'thanks', subject: 'general', confidence: 0.7 }, 'A<b>')).toBe(
      '🎉 <b>Welcome A&lt;b&gt;!</b>\n\nAur koi doubt hai? Puchte raho! 😊',
    );
    expect(last.buildContextualReply({ intent: 'best_wishes', subject: 'general', confidence: 0.7 }, 'Asha')).toBe(
      '🌈 <b>Same to you!</b> Koi problem ho toh batana, tension mat lo!',
    );
    expect(
      first.buildContextualReply({ intent: 'file_request', subject: 'math', confidence: 0.9 }, 'Asha', { fileCount: 0 }),
    ).toBe('❌ <b>Koi files nahi mili!</b>\nPehle kuch files upload karo.');
    expect(
      first.buildContextualReply({ intent: 'quiz_request', subject: 'math', confidence: 0.9 }, 'Asha', { quizCount: 2 }),
    ).toBe('🧠 <b>Math quiz banate hai!</b>\n\nPDF bhejo, main usse quiz bana dungi.\n\n📊 <b>Previous quizzes:</b> 2');
  });

  it('summarizes the conversation', async () => {
    getHistory.mockResolvedValue([
      turn('user', 'math doubt'),
      turn('bot', 'ok'),
      turn('user', 'algebra help'),
      turn('user', 'hello'),
    ]);

    const summary = await new ContextService().summarizeConversation(42);

    expect(getHistory).toHaveBeenCalledWith(42, 50);
    expect(summary).toEqual({
      totalMessages: 4,
      userMessages: 3,
      botMessages: 1,
      topIntents: [
        ['doubt_solving', 2],
        ['greeting', 1],
      ],
      topSubjects: [
        ['math', 2],
        ['general', 1],
      ],
    });
  });
});

import { describe, it, expect } from 'vitest';
import { formatMemory, formatUserStats } from './bot-messages.js';

describe('formatMemory', () => {
  it('truncates long turns and escapes html', () => {
    const sentAt = new Date('2024-02-03T10:00:00Z');
    const text = formatMemory([
      { userTelegramId: 1, chatTelegramId: 1, sender: 'user', text: 'a'.repeat(105), messageType: 'text', sentAt },
      { userTelegramId: 1, chatTelegramId: 1, sender: 'bot', text: '<b>hi</b>', messageType: 'text', sentAt },
    ]);

    expect(text).toBe(`🧠 <b>Recent conversation</b>\n\n👤 ${'a'.repeat(100)}...\n🤖 &lt;b&gt;hi&lt;/b&gt;`);
  });
});

describe('formatUserStats', () => {
  it('combines user, quiz, file and conversation stats', () => {
    const text = formatUserStats(
      { totalMessages: 12, storedTurns: 20, files: 2, memberSince: new Date('2024-02-03T10:00:00Z') },
      { quizzesCreated: 1, attempts: 2, averagePercentage: 75, bestPercentage: 100 },
      { totalFiles: 2, totalSize: 1536, byType: {}, recentUploads: 1 },
      {
        totalMessages: 20,
        userMessages: 10,
        botMessages: 10,
        topIntents: [['general', 6]],
        topSubjects: [
          ['general', 5],
          ['math', 3],
        ],
      },
    );

    expect(text).toBe(
      [
        '📊 <b>Tumhare Stats</b>',
        '',
        '💬 Messages: 12',
        '🧠 Saved conversation: 20 turns',
        '📁 Files: 2 (1.5 KB), is hafte 1',
        '📝 Quizzes created: 1',
        '✅ Quiz attempts: 2 (avg 75%, best 100%)',
        '🎯 Top subjects: math (3)',
        '📅 Member since: 2024-02-03',
      ].join('\n'),
    );
  });
});

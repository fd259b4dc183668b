import { UserStats } from '../database/index.js';
import { ConversationTurn } from '../database/models/Conversation.js';
import { Quiz } from '../database/models/Quiz.js';
import { StoredFile } from '../database/models/StoredFile.js';
import { escapeHtml, truncate } from '../utils/html.js';
import { ConversationSummary } from './context.service.js';
import { FileMatch, FileStats, formatFileSize } from './file.service.js';
import { AttemptResult, UserQuizStats } from './quiz.service.js';

export const GENERIC_ERROR = '😅 Kuch gadbad ho gayi! Thodi der baad try karo.';

export const MEMORY_TURNS = 10;
const MEMORY_TEXT_LIMIT = 100;

export const getStartMessage = (name: string): string => `🙏 <b>Namaste ${escapeHtml(name)}! Main Vidya hun</b>, tumhari study buddy.

<b>Main kya kar sakti hun:</b>
💬 Doubts solve karna, Hinglish me
📚 Tumhare notes aur PDFs save karke dhoondhna
🧠 PDF se quiz banana
📸 Photo se problem solve karna
👥 Group me quiz competition chalana

Bas message karo ya file bhejo! Commands ke liye /help dekho.`;

export const HELP_MESSAGE = `📖 <b>Commands</b>

/start - shuru karo
/help - ye message
/memory - last ${MEMORY_TURNS} messages
/notes [query] - apni files dhoondho
/files - saari files, delete buttons ke saath
/tag &lt;fileId&gt; &lt;tags&gt; - file ko tag karo
/quiz - latest quiz shuru karo (group me group quiz)
/myquizzes - tumhare quizzes
/stats - tumhare stats

<b>Groups me:</b>
/leaderboard - group leaderboard
/quizsettings time=60 questions=5 join=30 - quiz settings (admins)
/stopquiz - active quiz band karo (admins)

📄 PDF bhejo → quiz milega
📸 Problem ki photo bhejo → solution milega`;

export const getGroupWelcome = (title: string): string =>
  `👋 <b>Namaste ${escapeHtml(title)}!</b>\n\n` +
  'Main Vidya hun. /quiz se group quiz start karo aur /leaderboard pe apna rank dekho! 🏆';

export const formatMemory = (history: ConversationTurn[]): string => {
  if (history.length === 0) {
    return '🧠 <b>Abhi tak koi conversation nahi hui!</b>\n\nKuch pucho, main yaad rakhungi.';
  }
  const lines = history.map(
    (turn) =>
      `${turn.sender === 'user' ? '👤' : '🤖'} ${escapeHtml(truncate(turn.text, MEMORY_TEXT_LIMIT))}`,
  );
  return `🧠 <b>Recent conversation</b>\n\n${lines.join('\n')}`;
};

const fileLine = (file: StoredFile, index: number): string =>
  `${index + 1}. 📄 <b>${escapeHtml(file.fileName)}</b> (${formatFileSize(file.fileSize)})` +
  `${file.tags.length > 0 ? ` 🏷 ${file.tags.map((t) => `#${escapeHtml(t)}`).join(' ')}` : ''}` +
  `\n    <code>${file._id?.toHexString() ?? ''}</code>`;

export const formatFileList = (files: StoredFile[]): string => {
  if (files.length === 0) {
    return '📂 <b>Koi files nahi hai!</b>\n\nPDF ya notes bhejo, main save kar lungi.';
  }
  return `📂 <b>Tumhari files</b> (${files.length})\n\n${files.map(fileLine).join('\n')}`;
};

export const formatFileMatches = (matches: FileMatch[]): string => {
  if (matches.length === 0) {
    return '❌ <b>Koi files nahi mili!</b>\nPehle kuch files upload karo.';
  }
  const heading = matches.every((m) => m.matchType === 'recent')
    ? '🕒 <b>Match nahi mila, ye recent files hai:</b>'
    : '📚 <b>Ye files mili:</b>';
  return `${heading}\n\n${matches.map((m, i) => fileLine(m.file, i)).join('\n')}`;
};

export const formatQuizList = (quizzes: Quiz[]): string => {
  if (quizzes.length === 0) {
    return '📝 <b>Abhi koi quiz nahi hai!</b>\n\nPDF bhejo, main quiz bana dungi.';
  }
  const lines = quizzes.map(
    (quiz, i) =>
      `${i + 1}. <b>${escapeHtml(quiz.title)}</b> - ${quiz.questions.length} questions ` +
      `(${quiz.createdAt.toISOString().slice(0, 10)})`,
  );
  return `📝 <b>Tumhare quizzes</b>\n\n${lines.join('\n')}`;
};

export const formatQuizCreated = (quiz: Quiz): string =>
  `✅ <b>${escapeHtml(quiz.title)}</b> ready hai!\n\n` +
  `❓ Questions: ${quiz.questions.length}\n` +
  `📚 Subject: ${quiz.subject}\n` +
  `🎯 Difficulty: ${quiz.difficulty}`;

export const formatAttemptResult = (result: AttemptResult): string => {
  const cheer =
    result.percentage >= 80
      ? '🌟 Zabardast!'
      : result.percentage >= 50
        ? '👍 Accha hai, aur practice karo!'
        : '💪 Koi baat nahi, dobara try karo!';
  return (
    `🏁 <b>Quiz complete!</b>\n\n` +
    `✅ Score: <b>${result.score}/${result.total}</b> (${result.percentage}%)\n` +
    `⏱ Time: ${result.timeTakenSec}s\n\n${cheer}`
  );
};

export const formatUserStats = (
  stats: UserStats,
  quizzes: UserQuizStats,
  files: FileStats,
  summary: ConversationSummary,
): string => {
  const subjects = summary.topSubjects
    .filter(([subject]) => subject !== 'general')
    .map(([subject, count]) => `${subject} (${count})`)
    .join(', ');

  return [
    '📊 <b>Tumhare Stats</b>',
    '',
    `💬 Messages: ${stats.totalMessages}`,
    `🧠 Saved conversation: ${stats.storedTurns} turns`,
    `📁 Files: ${files.totalFiles} (${formatFileSize(files.totalSize)}), is hafte ${files.recentUploads}`,
    `📝 Quizzes created: ${quizzes.quizzesCreated}`,
    `✅ Quiz attempts: ${quizzes.attempts} (avg ${quizzes.averagePercentage}%, best ${quizzes.bestPercentage}%)`,
    subjects ? `🎯 Top subjects: ${subjects}` : '',
    stats.memberSince ? `📅 Member since: ${stats.memberSince.toISOString().slice(0, 10)}` : '',
  ]
    .filter((line, i) => i < 2 || line.length > 0)
    .join('\n');
};

import { z } from 'zod';
import { loadDataFile } from '../common/data.js';
import logger from '../common/logger.js';
import { INTENT, Intent, SUBJECTS, Subject } from '../common/message-types.js';
import { database } from '../database/index.js';
import { ConversationTurn } from '../database/models/Conversation.js';
import { escapeHtml } from '../utils/html.js';

export interface ContextAnalysis {
  intent: Intent;
  subject: Subject;
  confidence: number;
}

export interface ReplyExtras {
  fileCount?: number;
  quizCount?: number;
}

export interface ConversationSummary {
  totalMessages: number;
  userMessages: number;
  botMessages: number;
  topIntents: [Intent, number][];
  topSubjects: [Subject, number][];
}

type IntentRule = [Exclude<Intent, 'general'>, RegExp[]];

// First matching intent wins, so the order matters.
const INTENT_RULES: IntentRule[] = [
  [
    INTENT.FILE_REQUEST,
    [
      /\bsend me\b/,
      /\bnotes? (chahiye|bhejo|do|dedo)\b/,
      /\bfiles? (chahiye|bhejo|do|dedo)\b/,
      /\bshare\b/,
    ],
  ],
  [INTENT.QUIZ_REQUEST, [/\bquiz(zes)?\b/, /\bmcqs?\b/, /\bmock test\b/]],
  [
    INTENT.DOUBT_SOLVING,
    [/\bdoubts?\b/, /\bproblem\b/, /\bhelp\b/, /\bsolve\b/, /\bexplain\b/, /\bsamjha(o|do)\b/],
  ],
  [
    INTENT.BEST_WISHES,
    [/\bbest wishes\b/, /\bgood luck\b/, /\ball the best\b/, /\bwish(ing)? you\b/],
  ],
  [
    INTENT.THANKS,
    [/\bthanks?\b/, /\bthank you\b/, /\bdhanyawad\b/, /\bshukriya\b/, /\b(awesome|perfect|excellent)\b/],
  ],
  [
    INTENT.GREETING,
    [
      /\b(hi|hello|hey|namaste|namaskar)\b/,
      /\bgood (morning|afternoon|evening)\b/,
      /\bkaise ho\b/,
      /\bhow are you\b/,
    ],
  ],
];

const FALLBACK_RULES: IntentRule[] = [
  [INTENT.FILE_REQUEST, [/\b(notes|file|pdf)/]],
  [INTENT.QUIZ_REQUEST, [/\b(test|questions|mcq)/]],
];

const subjectKeywordsSchema = z.record(z.enum(SUBJECTS), z.array(z.string().min(1)));

const subjectKeywords = loadDataFile('subject-keywords.json', subjectKeywordsSchema);

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// keywords match at a word start so "aftermath" is not math
const SUBJECT_PATTERNS = SUBJECTS.flatMap((subject): [Subject, RegExp][] => {
  const keywords = subjectKeywords[subject] ?? [];
  return keywords.length > 0
    ? [[subject, new RegExp(`\\b(${keywords.map(escapeRegExp).join('|')})`)]]
    : [];
});

const THANKS_REPLIES = [
  '🎉 <b>Welcome {name}!</b>\n\nAur koi doubt hai? Puchte raho! 😊',
  '😊 <b>Koi baat nahi {name}!</b>\n\nPadhai me kuch bhi atke toh seedha pucho.',
  '✨ <b>Anytime {name}!</b>\n\nSuffering karte rahne se kya fayda, ask away! 🤓',
  '🙌 <b>Khushi hui help karke, {name}!</b>\n\nNext doubt ka wait kar rahi hun.',
];

const BEST_WISHES_REPLIES = [
  '🌟 <b>Best wishes to you too!</b> Aur koi doubt hai? Puchte raho, main yahan hun!',
  "✨ <b>Thank you!</b> Koi aur question hai? Don't suffer in silence, ask away!",
  '🎉 <b>All the best!</b> Aur doubts lao, milke solve karenge!',
  '🌈 <b>Same to you!</b> Koi problem ho toh batana, tension mat lo!',
];

const SUBJECT_HISTORY_TURNS = 3;
const ANALYSIS_HISTORY_TURNS = 5;
const SUMMARY_HISTORY_TURNS = 50;

export const detectIntent = (text: string): Intent => {
  const lower = text.toLowerCase();
  for (const rules of [INTENT_RULES, FALLBACK_RULES]) {
    for (const [intent, patterns] of rules) {
      if (patterns.some((pattern) => pattern.test(lower))) {
        return intent;
      }
    }
  }
  return INTENT.GENERAL;
};

const subjectOf = (text: string): Subject | null => {
  const lower = text.toLowerCase();
  for (const [subject, pattern] of SUBJECT_PATTERNS) {
    if (pattern.test(lower)) {
      return subject;
    }
  }
  return null;
};

/**
 * Subject of the current text, else of the latest turns (newest first).
 */
export const extractSubject = (text: string, history: ConversationTurn[]): Subject => {
  const candidates = [text, ...history.slice(-SUBJECT_HISTORY_TURNS).reverse().map((t) => t.text)];
  for (const candidate of candidates) {
    const subject = subjectOf(candidate);
    if (subject) {
      return subject;
    }
  }
  return 'general';
};

export const computeConfidence = (intent: Intent, subject: Subject, text: string): number => {
  // tenths keep the sum exact
  let tenths = 5;
  if (intent !== INTENT.GENERAL) tenths += 2;
  if (subject !== 'general') tenths += 2;
  if (text.trim().split(/\s+/).length > 3) tenths += 1;
  return Math.min(tenths, 10) / 10;
};

const topCounts = <T extends string>(values: T[], limit: number): [T, number][] => {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
};

const subjectLabel = (subject: Subject): string =>
  subject === 'general' ? 'General' : subject.charAt(0).toUpperCase() + subject.slice(1);

export class ContextService {
  constructor(private readonly rng: () => number = Math.random) {}

  async analyze(userId: number, text: string): Promise<ContextAnalysis> {
    const history = await database.getConversationModel().getHistory(userId, ANALYSIS_HISTORY_TURNS);

    const intent = detectIntent(text);
    const subject = extractSubject(text, history);
    const confidence = computeConfidence(intent, subject, text);

    const contexts = database.getUserContextModel();
    await contexts.updateContext(userId, {
      lastIntent: intent,
      lastSubject: subject,
      ...(subject !== 'general' ? { currentTopic: subject } : {}),
    });
    await contexts.recordQuery(userId, text);

    logger.debug({ userId, intent, subject, confidence }, 'Message context analyzed');

    return { intent, subject, confidence };
  }

  buildContextualReply(analysis: ContextAnalysis, userName: string, extras: ReplyExtras = {}): string {
    const subject = subjectLabel(analysis.subject);

    switch (analysis.intent) {
      case INTENT.THANKS:
        return this.pick(THANKS_REPLIES).replace('{name}', escapeHtml(userName));
      case INTENT.BEST_WISHES:
        return this.pick(BEST_WISHES_REPLIES);
      case INTENT.FILE_REQUEST:
        return extras.fileCount
          ? `📚 <b>${subject} files mil gayi!</b>\n\nCheck karo:`
          : '❌ <b>Koi files nahi mili!</b>\nPehle kuch files upload karo.';
      case INTENT.QUIZ_REQUEST: {
        const base = `🧠 <b>${subject} quiz banate hai!</b>\n\nPDF bhejo, main usse quiz bana dungi.`;
        return extras.quizCount
          ? `${base}\n\n📊 <b>Previous quizzes:</b> ${extras.quizCount}`
          : base;
      }
      case INTENT.DOUBT_SOLVING:
        return `🤔 <b>${subject} doubt solve karte hai!</b>\n\nImage bhejo ya detail me batao.`;
      case INTENT.GREETING:
      case INTENT.GENERAL:
        return `😊 <b>Namaste ${escapeHtml(userName)}! Main Vidya hun.</b>\n\nKoi doubt, file, ya quiz chahiye?`;
    }
  }

  async summarizeConversation(userId: number): Promise<ConversationSummary> {
    const history = await database.getConversationModel().getHistory(userId, SUMMARY_HISTORY_TURNS);
    const userTurns = history.filter((turn) => turn.sender === 'user');

    return {
      totalMessages: history.length,
      userMessages: userTurns.length,
      botMessages: history.length - userTurns.length,
      topIntents: topCounts(userTurns.map((t) => detectIntent(t.text)), 3),
      topSubjects: topCounts(userTurns.map((t) => extractSubject(t.text, [])), 3),
    };
  }

  private pick(options: string[]): string {
    return options[Math.floor(this.rng() * options.length)] ?? options[0] ?? '';
  }
}

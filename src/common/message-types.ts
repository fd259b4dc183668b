export const MESSAGE_TYPE = {
  TEXT: 'text',
  COMMAND: 'command',
  PHOTO: 'photo',
  DOCUMENT: 'document',
  QUIZ: 'quiz',
  OTHER: 'other',
} as const;

export type MessageType = typeof MESSAGE_TYPE[keyof typeof MESSAGE_TYPE];

export const FILE_TYPE = {
  PDF: 'pdf',
  IMAGE: 'image',
  DOCUMENT: 'document',
  AUDIO: 'audio',
  VIDEO: 'video',
  OTHER: 'other',
} as const;

export type FileType = typeof FILE_TYPE[keyof typeof FILE_TYPE];

export const INTENT = {
  FILE_REQUEST: 'file_request',
  QUIZ_REQUEST: 'quiz_request',
  DOUBT_SOLVING: 'doubt_solving',
  BEST_WISHES: 'best_wishes',
  THANKS: 'thanks',
  GREETING: 'greeting',
  GENERAL: 'general',
} as const;

export type Intent = typeof INTENT[keyof typeof INTENT];

export const SUBJECTS = [
  'math',
  'physics',
  'chemistry',
  'biology',
  'computer',
  'english',
  'hindi',
] as const;

export type Subject = typeof SUBJECTS[number] | 'general';

export const ANSWER_LETTERS = ['A', 'B', 'C', 'D'] as const;

export type AnswerLetter = typeof ANSWER_LETTERS[number];

export const isAnswerLetter = (value: string): value is AnswerLetter =>
  (ANSWER_LETTERS as readonly string[]).includes(value);

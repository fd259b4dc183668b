import { ObjectId } from 'mongodb';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InsufficientTextError } from '../common/errors.js';
import { Quiz, QuizQuestion } from '../database/models/Quiz.js';

const { addQuiz, addAttempt, pdfParse } = vi.hoisted(() => ({
  addQuiz: vi.fn(),
  addAttempt: vi.fn(),
  pdfParse: vi.fn(),
}));

vi.mock('../database/index.js', () => ({
  database: {
    getQuizModel: () => ({ addQuiz }),
    getQuizAttemptModel: () => ({ addAttempt }),
  },
}));

vi.mock('pdf-parse/lib/pdf-parse.js', () => ({ default: pdfParse }));

import {
  QuizService,
  cleanText,
  createVariation,
  formatQuiz,
  parseQuizResponse,
  percentage,
  questionTarget,
  splitIntoChunks,
  toAnswerLetter,
} from './quiz.service.js';

const question = (text: string, options: QuizQuestion['options'], answer: QuizQuestion['answer']): QuizQuestion => ({
  question: text,
  options,
  answer,
  explanation: '',
  difficulty: 'medium',
  type: 'multiple_choice',
});

const q1 = question('2+2?', ['3', '4', '5', '6'], 'B');
const q2 = question('Last letter?', ['w', 'x', 'y', 'z'], 'D');

const quiz: Quiz = {
  _id: new ObjectId('65f000000000000000000001'),
  ownerTelegramId: 7,
  title: 'Quiz: basics',
  questions: [q1, q2],
  subject: 'math',
  difficulty: 'medium',
  createdAt: new Date('2024-03-01T00:00:00Z'),
};

const first = () => 0;

describe('text preparation', () => {
  it('cleans extracted text', () => {
    expect(cleanText('  Line one \r\n\r\n\r\n\tLine   two  ')).toBe('Line one\n\nLine two');
  });

  it('computes the question target', () => {
    expect(questionTarget(120, 10)).toBe(3);
    expect(questionTarget(2600, 10)).toBe(5);
    expect(questionTarget(20000, 10)).toBe(10);
    expect(questionTarget(20000, 7)).toBe(7);
  });

  it('splits text into sentence chunks', () => {
    expect(splitIntoChunks('One two. Three four! Five six?', 20)).toEqual(['One two. Three four!', 'Five six?']);
    expect(splitIntoChunks('abcdefghij. xy.', 4)).toEqual(['abcd', 'efgh', 'ij.', 'xy.']);
  });
});

describe('parseQuizResponse', () => {
  it('reads fenced json and drops invalid items', () => {
    const raw =
      '```json\n[{"question":"2+2?","options":["3","4","5","6"],"correct_answer":"B","explanation":"basic"},' +
      '{"question":"bad","options":["x"],"correct_answer":"A"}]\n```';

    expect(parseQuizResponse(raw)).toEqual([{ ...q1, explanation: 'basic' }]);
  });

  it('reads a wrapped questions object with index answers', () => {
    const raw = 'Sure! {"questions":[{"question":"Q","options":["a","b","c","d"],"answer":0,"difficulty":"Hard"}]}';

    expect(parseQuizResponse(raw)).toEqual([
      { ...question('Q', ['a', 'b', 'c', 'd'], 'A'), difficulty: 'hard' },
    ]);
  });

  it('falls back to the text format', () => {
    const raw = [
      'Q1. Bharat ka capital?',
      'A) Mumbai',
      'B) Delhi',
      'C) Pune',
      'D) Goa',
      'Answer: B',
      'Explanation: Delhi hai.',
      '',
      'Q2. Incomplete?',
      'A) x',
      'Answer: A',
    ].join('\n');

    expect(parseQuizResponse(raw)).toEqual([
      { ...question('Bharat ka capital?', ['Mumbai', 'Delhi', 'Pune', 'Goa'], 'B'), explanation: 'Delhi hai.' },
    ]);
  });

  it('normalizes answer values', () => {
    expect(toAnswerLetter('b')).toBe('B');
    expect(toAnswerLetter('(C)')).toBe('C');
    expect(toAnswerLetter(2)).toBe('C');
    expect(toAnswerLetter('3')).toBe('D');
    expect(toAnswerLetter('E')).toBeNull();
    expect(toAnswerLetter(1.5)).toBeNull();
    expect(toAnswerLetter(undefined)).toBeNull();
  });
});

describe('createVariation', () => {
  it('reorders questions and options keeping answers correct', () => {
    const variation = createVariation(quiz, first);

    expect(variation._id).toEqual(quiz._id);
    expect(variation.questions).toEqual([
      { ...q2, options: ['x', 'y', 'z', 'w'], answer: 'C' },
      { ...q1, options: ['4', '5', '6', '3'], answer: 'A' },
    ]);
  });
});

describe('QuizService', () => {
  const ai = { generateQuizQuestions: vi.fn() };

  beforeEach(() => {
    ai.generateQuizQuestions.mockReset();
    addQuiz.mockReset().mockImplementation(async (doc: Omit<Quiz, '_id' | 'createdAt'>) => ({
      ...doc,
      _id: new ObjectId('65f000000000000000000002'),
      createdAt: new Date('2024-03-02T00:00:00Z'),
    }));
    addAttempt.mockReset().mockResolvedValue(undefined);
  });

  const studyText = 'Photosynthesis happens in leaves. '.repeat(40);

  it('generates and samples questions down to the target', async () => {
    const items = ['Q1', 'Q2', 'Q3', 'Q4'].map((q) => ({
      question: q,
      options: ['a', 'b', 'c', 'd'],
      correct_answer: 'A',
    }));
    ai.generateQuizQuestions.mockResolvedValue(JSON.stringify(items));
    const service = new QuizService(ai, first);

    const result = await service.generateFromText(7, studyText, 'biology-notes.pdf', 'file-1');

    expect(ai.generateQuizQuestions).toHaveBeenCalledTimes(1);
    expect(ai.generateQuizQuestions.mock.calls[0]?.[1]).toBe(4);
    expect(result.questions.map((q) => q.question)).toEqual(['Q2', 'Q3', 'Q4']);
    expect(addQuiz).toHaveBeenCalledWith(
      expect.objectContaining({
        ownerTelegramId: 7,
        title: 'Quiz: biology-notes',
        sourceFileId: 'file-1',
        subject: 'biology',
        difficulty: 'medium',
      }),
    );
  });

  it('falls back to fill-in-the-blank questions when the model fails', async () => {
    ai.generateQuizQuestions.mockRejectedValue(new Error('timeout'));
    const service = new QuizService(ai, first);

    const result = await service.generateFromText(7, studyText, 'biology-notes.pdf');

    expect(result.questions).toHaveLength(3);
    expect(result.questions[0]).toEqual({
      question: 'Fill in the blank: ______ happens in leaves.',
      options: ['leaves', 'happens', 'Option 4', 'Photosynthesis'],
      answer: 'D',
      explanation: "Sahi word hai 'Photosynthesis'.",
      difficulty: 'easy',
      type: 'fill_blank',
    });
  });

  it('rejects pdfs without enough text', async () => {
    pdfParse.mockResolvedValue({ text: '  Hello \n\n\n world ' });
    const service = new QuizService(ai, first);

    await expect(service.generateFromPdf(7, Buffer.from('%PDF'), 'scan.pdf')).rejects.toBeInstanceOf(
      InsufficientTextError,
    );
    expect(ai.generateQuizQuestions).not.toHaveBeenCalled();
  });

  it('plays a personal quiz and records the attempt', async () => {
    const service = new QuizService(ai, first);
    const state = service.startAttempt(quiz, 1_000);

    expect(state.quizId).toBe('65f000000000000000000001');
    expect(service.answerQuestion(state, 1, 'A')).toBeNull();

    const firstAnswer = service.answerQuestion(state, 0, 'C');
    expect(firstAnswer?.correct).toBe(true);
    expect(firstAnswer?.finished).toBe(false);

    const secondAnswer = firstAnswer && service.answerQuestion(firstAnswer.state, 1, 'B');
    expect(secondAnswer?.correct).toBe(false);
    expect(secondAnswer?.finished).toBe(true);

    const finalState = secondAnswer?.state ?? state;
    addAttempt.mockImplementation(async (attempt: object) => ({
      ...attempt,
      _id: new ObjectId('65f0000000000000000000aa'),
    }));
    const result = await service.finishAttempt(9, 9, finalState, 31_000);

    expect(result).toEqual({
      attemptId: '65f0000000000000000000aa',
      score: 1,
      total: 2,
      percentage: 50,
      timeTakenSec: 30,
    });
    expect(addAttempt).toHaveBeenCalledWith(
      expect.objectContaining({
        quizId: state.quizId,
        quizTitle: 'Quiz: basics',
        questions: finalState.questions,
        userTelegramId: 9,
        score: 1,
        totalQuestions: 2,
      }),
    );
  });

  it('writes the answer key in the order the attempt asked', () => {
    const state = new QuizService(ai, first).startAttempt(quiz, 1_000);

    expect(formatQuiz({ title: state.title, questions: state.questions }, true)).toBe(
      '📝 <b>Quiz: basics</b>\n\n' +
        '<b>1.</b> Last letter?\n   A) x\n   B) y\n   C) z\n   D) w\n   ✅ <b>C</b>\n\n' +
        '<b>2.</b> 2+2?\n   A) 4\n   B) 5\n   C) 6\n   D) 3\n   ✅ <b>A</b>',
    );
  });

  it('rounds percentages to one decimal', () => {
    expect(percentage(1, 3)).toBe(33.3);
    expect(percentage(0, 0)).toBe(0);
  });
});

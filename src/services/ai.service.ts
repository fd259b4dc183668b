import OpenAI from 'openai';
import { config } from '../common/config.js';
import logger from '../common/logger.js';
import { ConversationTurn } from '../database/models/Conversation.js';
import { getDoubtPrompt, getPersonaPrompt } from '../prompts/persona.js';
import { QUIZ_SYSTEM_PROMPT, buildQuizPrompt } from '../prompts/quiz.js';
import { OCR_SYSTEM_PROMPT, SOLVER_SYSTEM_PROMPT } from '../prompts/solver.js';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export const FALLBACK_REPLY =
  '😅 Sorry yaar, abhi thoda issue aa raha hai. Thodi der baad try karo!';

export class AiService {
  private openai: OpenAI;

  constructor() {
    this.openai = new OpenAI({
      apiKey: config.openAi.apiKey,
      baseURL: config.openAi.baseUrl,
    });
  }

  /**
   * Free-form chat reply in the bot's persona. Never throws: a failed call
   * yields {@link FALLBACK_REPLY} so the conversation keeps going.
   */
  async generateChatReply(
    history: ConversationTurn[],
    userText: string,
    userName: string,
  ): Promise<string> {
    return this.replyOrFallback('chat', [
      { role: 'system', content: getPersonaPrompt(userName) },
      ...this.buildContext(history),
      { role: 'user', content: userText },
    ]);
  }

  async answerDoubt(
    question: string,
    subject: string,
    history: ConversationTurn[],
  ): Promise<string> {
    return this.replyOrFallback('doubt', [
      { role: 'system', content: getDoubtPrompt(subject) },
      ...this.buildContext(history),
      { role: 'user', content: question },
    ]);
  }

  async generateQuizQuestions(textChunk: string, questionCount: number): Promise<string> {
    logger.info(
      { chunkLength: textChunk.length, questionCount },
      'Requesting quiz questions',
    );

    const startedAt = Date.now();
    const completion = await this.openai.chat.completions.create({
      model: config.openAi.chatModel,
      messages: [
        { role: 'system', content: QUIZ_SYSTEM_PROMPT },
        { role: 'user', content: buildQuizPrompt(textChunk, questionCount) },
      ],
      temperature: 0.7,
      max_tokens: 2000,
    });

    const content = completion.choices[0]?.message?.content?.trim() || '';
    logger.info(
      {
        durationMs: Date.now() - startedAt,
        tokensUsed: completion.usage?.total_tokens,
        responseLength: content.length,
      },
      'Quiz questions received',
    );
    return content;
  }

  /**
   * Vision fallback for OCR. API failures propagate; an empty reply means
   * the model saw no text.
   */
  async extractTextFromImage(imageDataUrl: string): Promise<string> {
    logger.info(
      { contentTypePrefix: imageDataUrl.slice(0, 30) },
      'Starting image text extraction',
    );
    const completion = await this.openai.chat.completions.create({
      model: config.openAi.visionModel,
      messages: [
        { role: 'system', content: OCR_SYSTEM_PROMPT },
        {
          role: 'user',
          content: [{ type: 'image_url', image_url: { url: imageDataUrl } }],
        },
      ],
      temperature: 0,
      max_tokens: 1500,
    });

    const text = completion.choices[0]?.message?.content?.trim() || '';
    logger.info(
      { textLength: text.length, tokensUsed: completion.usage?.total_tokens },
      'Image text extraction completed',
    );
    return text;
  }

  async solveProblem(problemText: string): Promise<string> {
    const completion = await this.openai.chat.completions.create({
      model: config.openAi.chatModel,
      messages: [
        { role: 'system', content: SOLVER_SYSTEM_PROMPT },
        { role: 'user', content: problemText },
      ],
      temperature: 0.2,
      max_tokens: 1200,
    });

    return completion.choices[0]?.message?.content?.trim() || '';
  }

  private async replyOrFallback(kind: string, messages: ChatMessage[]): Promise<string> {
    try {
      logger.info({ kind, messagesCount: messages.length }, 'Generating AI response');

      const startedAt = Date.now();
      const completion = await this.openai.chat.completions.create({
        model: config.openAi.chatModel,
        messages,
        temperature: 0.8,
        max_tokens: 1000,
        presence_penalty: 0.3,
      });

      const reply = completion.choices[0]?.message?.content?.trim();
      if (!reply) {
        throw new Error('Empty response from AI service');
      }

      logger.info(
        {
          kind,
          durationMs: Date.now() - startedAt,
          responseLength: reply.length,
          tokensUsed: completion.usage?.total_tokens,
        },
        'AI response generated successfully',
      );
      return reply;
    } catch (error) {
      logger.error(error, `Failed to generate AI response (${kind})`);
      return FALLBACK_REPLY;
    }
  }

  private buildContext(history: ConversationTurn[]): ChatMessage[] {
    return history
      .slice(-config.memory.contextWindowSize)
      .filter((turn) => turn.text.trim().length > 0)
      .map((turn): ChatMessage =>
        turn.sender === 'bot'
          ? { role: 'assistant', content: turn.text }
          : { role: 'user', content: turn.text },
      );
  }
}

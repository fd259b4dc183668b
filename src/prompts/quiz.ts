export const QUIZ_SYSTEM_PROMPT =
  'You are an expert quiz generator for Indian students. Write questions in Hindi-English mixed style (Hinglish). ' +
  'Respond with JSON only.';

export const buildQuizPrompt = (textChunk: string, questionCount: number): string => `
Based on the following text, generate ${questionCount} multiple choice questions. Each question should:
1. Test understanding of key concepts from the text
2. Have exactly 4 options
3. Have exactly one correct answer
4. Be clear and unambiguous
5. Be in Hinglish suitable for Indian students

Text:
${textChunk}

Respond with a JSON array using this structure:
[
  {
    "question": "Question text in Hinglish",
    "options": ["Option A", "Option B", "Option C", "Option D"],
    "correct_answer": "A",
    "explanation": "Brief explanation in Hinglish",
    "difficulty": "easy | medium | hard"
  }
]
`;

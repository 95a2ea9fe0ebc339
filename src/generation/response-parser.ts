import { FAQ_GENERATION_SCHEMA, type FaqPair } from '../schemas/faq-generation-schema';
import { ParseError } from '../errors/index';

const PREVIEW_LENGTH = 200;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)} ...` : text;
}

// Blank questions and answers stay in; the quality filter rejects them as EmptyOrMalformed
function cleanPairs(pairs: FaqPair[]): FaqPair[] {
  return pairs.map((pair) => ({
    question: pair.question.trim(),
    answer: pair.answer.trim(),
    ...(pair.evidence !== undefined && pair.evidence.trim() !== '' && { evidence: pair.evidence.trim() }),
  }));
}

// JSON object between the first '{' and the last '}', if there is one that parses
function parseEmbeddedJson(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) {
    return undefined;
  }
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

/**
 * Reads "Q: ... A: ..." blocks. Markdown bold markers are dropped and each
 * answer ends at its first blank line.
 */
export function parseQuestionAnswerText(text: string): FaqPair[] {
  const pairs: FaqPair[] = [];
  for (const part of text.split('Q:').slice(1)) {
    const answerAt = part.indexOf('A:');
    if (answerAt < 0) continue;

    const question = part.slice(0, answerAt).replaceAll('**', '').trim();
    const answerText = part.slice(answerAt + 2).replaceAll('**', '').trim();
    const [answer = ''] = answerText.split('\n\n');

    if (question && answer) {
      pairs.push({ question, answer });
    }
  }
  return pairs;
}

/**
 * Turns a model response into question/answer pairs. Accepts the structured
 * `{ faqs: [...] }` object, or text holding that JSON or Q:/A: blocks.
 * @throws {ParseError} when the response is in none of those forms
 */
export function parseGenerationResponse(data: unknown, chunkIndex?: number): FaqPair[] {
  if (typeof data === 'string') {
    const embedded = parseEmbeddedJson(data);
    if (embedded !== undefined) {
      const structured = FAQ_GENERATION_SCHEMA.safeParse(embedded);
      if (structured.success) {
        return cleanPairs(structured.data.faqs);
      }
    }

    const pairs = parseQuestionAnswerText(data);
    if (pairs.length === 0) {
      throw new ParseError(
        'Response contains no question/answer pairs',
        chunkIndex,
        preview(data)
      );
    }
    return pairs;
  }

  const structured = FAQ_GENERATION_SCHEMA.safeParse(data);
  if (!structured.success) {
    const issue = structured.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ParseError(
      `Response does not match the FAQ schema${where}: ${issue?.message ?? 'invalid value'}`,
      chunkIndex,
      preview(JSON.stringify(data) ?? String(data))
    );
  }
  return cleanPairs(structured.data.faqs);
}

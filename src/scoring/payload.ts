/**
 * Read access into an assessment payload.
 *
 * Answers come from two places: plain top-level keys (`{"sleep": 8}`) and the
 * `form_response.answers` list of a Typeform webhook, keyed by `field.ref`.
 * A Typeform answer wins over a top-level key with the same name.
 */

export type AssessmentPayload = Record<string, unknown>;

export type AnswerValue = string | number | boolean;

export type FieldValue =
  | { present: true; value: AnswerValue }
  | { present: false };

export interface AnswerIndex {
  readonly payload: AssessmentPayload;
  readonly answers: ReadonlyMap<string, AnswerValue>;
}

const ABSENT: FieldValue = { present: false };

export function isJsonObject(value: unknown): value is AssessmentPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asAnswerValue(value: unknown): AnswerValue | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.trim() === '' ? undefined : value;
  return undefined;
}

function typeformAnswerValue(answer: Record<string, unknown>): AnswerValue | undefined {
  const type = answer['type'];

  switch (type) {
    case 'choice': {
      const choice = answer['choice'];
      return isJsonObject(choice) ? asAnswerValue(choice['label']) ?? asAnswerValue(choice['other']) : undefined;
    }
    case 'choices': {
      const choices = answer['choices'];
      if (!isJsonObject(choices)) return undefined;
      const labels = choices['labels'];
      return Array.isArray(labels) ? asAnswerValue(labels[0]) : undefined;
    }
    case 'text':
    case 'long_text':
    case 'short_text':
      return asAnswerValue(answer['text']);
    case 'number':
    case 'opinion_scale':
    case 'rating':
      return asAnswerValue(answer['number']);
    case 'boolean':
      return asAnswerValue(answer['boolean']);
    case 'email':
      return asAnswerValue(answer['email']);
    case 'date':
      return asAnswerValue(answer['date']);
    case 'phone_number':
      return asAnswerValue(answer['phone_number']);
    case 'url':
      return asAnswerValue(answer['url']);
    default:
      return undefined;
  }
}

function collectTypeformAnswers(payload: AssessmentPayload, into: Map<string, AnswerValue>): void {
  const formResponse = payload['form_response'];
  if (!isJsonObject(formResponse)) return;

  const answers = formResponse['answers'];
  if (!Array.isArray(answers)) return;

  for (const answer of answers) {
    if (!isJsonObject(answer)) continue;
    const field = answer['field'];
    if (!isJsonObject(field)) continue;
    const ref = field['ref'];
    if (typeof ref !== 'string' || ref === '') continue;

    const value = typeformAnswerValue(answer);
    if (value !== undefined) {
      into.set(ref, value);
    }
  }
}

export function buildAnswerIndex(payload: AssessmentPayload): AnswerIndex {
  const answers = new Map<string, AnswerValue>();

  for (const [key, raw] of Object.entries(payload)) {
    const value = asAnswerValue(raw);
    if (value !== undefined) {
      answers.set(key, value);
    }
  }

  collectTypeformAnswers(payload, answers);

  return { payload, answers };
}

function walkPath(payload: AssessmentPayload, path: string): unknown {
  let current: unknown = payload;
  for (const part of path.split('.')) {
    if (!isJsonObject(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Look a field up by answer ref, falling back to a dotted payload path.
 * "Missing" and "zero" are distinct: `{ present: true, value: 0 }` is an answer.
 */
export function extractField(index: AnswerIndex, ref: string): FieldValue {
  const answered = index.answers.get(ref);
  if (answered !== undefined) {
    return { present: true, value: answered };
  }

  if (ref.includes('.')) {
    const value = asAnswerValue(walkPath(index.payload, ref));
    if (value !== undefined) {
      return { present: true, value };
    }
  }

  return ABSENT;
}

export function firstPresent(index: AnswerIndex, refs: readonly string[]): AnswerValue | undefined {
  for (const ref of refs) {
    const field = extractField(index, ref);
    if (field.present) return field.value;
  }
  return undefined;
}

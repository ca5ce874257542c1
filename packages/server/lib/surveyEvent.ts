/**
 * Decoding of survey platform webhook events
 *
 * The platform sends loosely shaped JSON: answers may sit at the top level
 * or under the contact, and question text is only available through the
 * form definition.
 */

import {
  SurveyAnswer,
  SurveyContact,
  SurveyQuestion,
  SurveyWebhookEvent,
  isObject,
  optionalString,
} from '@survey-transcription/shared';

export const UNKNOWN_QUESTION = 'Unknown Question';

function readAnswer(raw: unknown): SurveyAnswer | null {
  if (!isObject(raw)) {
    return null;
  }
  return {
    type: optionalString(raw.type),
    media_url: optionalString(raw.media_url),
    question_id: optionalString(raw.question_id),
    answer_id: optionalString(raw.answer_id),
    share_id: optionalString(raw.share_id),
    poll_option_content: optionalString(raw.poll_option_content),
  };
}

function readAnswers(raw: unknown): SurveyAnswer[] | undefined {
  if (!Array.isArray(raw)) {
    return undefined;
  }
  return raw.map(readAnswer).filter((answer): answer is SurveyAnswer => answer !== null);
}

function readQuestion(raw: unknown): SurveyQuestion | null {
  if (!isObject(raw)) {
    return null;
  }
  const metadata = isObject(raw.metadata) ? { text: optionalString(raw.metadata.text) } : undefined;
  return { question_id: optionalString(raw.question_id), metadata };
}

/**
 * Decode an untyped webhook body into the fields the service reads
 */
export function readSurveyEvent(payload: unknown): SurveyWebhookEvent {
  if (!isObject(payload)) {
    return {};
  }

  let contact: SurveyContact | undefined;
  if (isObject(payload.contact)) {
    contact = {
      email: optionalString(payload.contact.email),
      name: optionalString(payload.contact.name),
      answers: readAnswers(payload.contact.answers),
    };
  }

  let form: SurveyWebhookEvent['form'];
  if (isObject(payload.form) && Array.isArray(payload.form.questions)) {
    form = {
      questions: payload.form.questions
        .map(readQuestion)
        .filter((question): question is SurveyQuestion => question !== null),
    };
  }

  return {
    event_type: optionalString(payload.event_type),
    interaction_id: optionalString(payload.interaction_id),
    contact,
    answers: readAnswers(payload.answers),
    form,
  };
}

/**
 * Answers listed at the top level, falling back to the contact's answers
 */
export function getEventAnswers(event: SurveyWebhookEvent): SurveyAnswer[] {
  return event.answers ?? event.contact?.answers ?? [];
}

/**
 * Label stored with the answer: the poll option, else the form question
 * text matched by question id, else "Unknown Question"
 */
export function resolveQuestionLabel(answer: SurveyAnswer, event: SurveyWebhookEvent): string {
  if (answer.poll_option_content) {
    return answer.poll_option_content;
  }

  if (answer.question_id) {
    const question = event.form?.questions?.find(q => q.question_id === answer.question_id);
    const text = question?.metadata?.text;
    if (text) {
      return text;
    }
  }

  return UNKNOWN_QUESTION;
}

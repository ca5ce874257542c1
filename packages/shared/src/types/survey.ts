/**
 * Survey platform webhook payloads
 * Only the fields the service reads are modelled; everything is optional
 * because the platform omits keys freely between event types.
 */

export type SurveyAnswerType = 'audio' | 'video' | 'text' | 'poll' | string;

export interface SurveyAnswer {
  type?: SurveyAnswerType;
  media_url?: string;
  question_id?: string;
  answer_id?: string;
  share_id?: string;
  poll_option_content?: string;
}

export interface SurveyContact {
  email?: string;
  name?: string;
  answers?: SurveyAnswer[];
}

export interface SurveyQuestion {
  question_id?: string;
  metadata?: {
    text?: string;
  };
}

export interface SurveyWebhookEvent {
  event_type?: string;
  interaction_id?: string;
  contact?: SurveyContact;
  answers?: SurveyAnswer[];
  form?: {
    questions?: SurveyQuestion[];
  };
}

import { describe, it, expect, beforeEach } from 'vitest'
import request from 'supertest'
import {
  SAMPLE_TRANSCRIPT,
  TEST_CALLBACK_URL,
  TEST_EMAIL,
  TEST_MEDIA_URL,
  TEST_QUESTION,
  type FakeProvider,
  type FakeSheet,
} from '../../tests/fakes.js'
import { createTestApp } from '../../tests/testApp.js'
import { ProviderError } from '../../lib/errors.js'
import type { Application } from 'express'

const surveyEvent = {
  event_type: 'interaction.completed',
  interaction_id: 'int-42',
  contact: { email: TEST_EMAIL, name: 'Test User' },
  answers: [
    { type: 'audio', media_url: TEST_MEDIA_URL, question_id: 'q1', answer_id: 'a1' },
  ],
  form: { questions: [{ question_id: 'q1', metadata: { text: TEST_QUESTION } }] },
}

describe('POST /webhook', () => {
  let app: Application
  let provider: FakeProvider
  let sheet: FakeSheet

  beforeEach(() => {
    ({ app, provider, sheet } = createTestApp())
  })

  it('should submit the answer and later store the transcript from the callback', async () => {
    const submitted = await request(app).post('/webhook').send(surveyEvent)

    expect(submitted.status).toBe(200)
    expect(submitted.body).toEqual({
      status: 'processed',
      errors: [],
      jobs: [{ media_url: TEST_MEDIA_URL, job_id: 'job-1' }],
    })
    expect(provider.submit).toHaveBeenCalledWith(
      TEST_MEDIA_URL,
      expect.objectContaining({ email: TEST_EMAIL, question: TEST_QUESTION, interaction_id: 'int-42' }),
      { callbackUrl: TEST_CALLBACK_URL, waitForCompletion: false }
    )

    const completed = await request(app).post('/webhook').send({
      job: {
        id: 'job-1',
        status: 'transcribed',
        metadata: JSON.stringify({ email: TEST_EMAIL, question: TEST_QUESTION, media_url: TEST_MEDIA_URL }),
        transcript: SAMPLE_TRANSCRIPT,
      },
    })

    expect(completed.status).toBe(200)
    expect(completed.body).toEqual({ status: 'stored', job_id: 'job-1', job_status: 'completed' })
    expect(sheet.writes).toEqual([
      { range: 'Responses!O1', value: TEST_MEDIA_URL },
      { range: 'Responses!P1', value: 'Hello world.' },
    ])
  })

  it('should answer 200 with embedded errors when submission fails', async () => {
    provider.submit.mockRejectedValue(
      new ProviderError('Transcription provider returned 400: invalid media', { providerStatus: 400 })
    )

    const response = await request(app).post('/webhook').send(surveyEvent)

    expect(response.status).toBe(200)
    expect(response.body).toEqual({
      status: 'processed',
      errors: [{ media_url: TEST_MEDIA_URL, error: 'Transcription provider returned 400: invalid media' }],
      jobs: [],
    })
  })

  it('should answer 200 when a callback cannot be parsed', async () => {
    const response = await request(app).post('/webhook').send({ job: { status: 'transcribed' } })

    expect(response.status).toBe(200)
    expect(response.body).toEqual({
      status: 'processed',
      errors: [{ error: 'Callback payload is missing the job id' }],
      jobs: [],
    })
  })

  it('should acknowledge callbacks for unfinished jobs', async () => {
    const response = await request(app).post('/webhook').send({ job: { id: 'job-5', status: 'in_progress' } })

    expect(response.status).toBe(200)
    expect(response.body).toEqual({ status: 'acknowledged', job_id: 'job-5', job_status: 'in_progress' })
    expect(sheet.writes).toEqual([])
  })
})

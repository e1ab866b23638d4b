import test from 'node:test'
import assert from 'node:assert/strict'
import {
  BanStatusResponseSchema,
  CHAT_MODE,
  FindPartnerRequestSchema,
  IceCandidateSchema,
  ReportReasonSchema,
  ReportUserRequestSchema,
  SendMessageRequestSchema,
  VideoOfferSchema,
} from './index'

test('FindPartnerRequestSchema defaults to text mode without interests', () => {
  const parsed = FindPartnerRequestSchema.safeParse({})
  assert.equal(parsed.success, true)
  if (!parsed.success) return
  assert.equal(parsed.data.chat_mode, CHAT_MODE.TEXT)
  assert.deepEqual(parsed.data.interests, [])
})

test('FindPartnerRequestSchema rejects unknown chat modes', () => {
  const parsed = FindPartnerRequestSchema.safeParse({ chat_mode: 'audio', interests: [] })
  assert.equal(parsed.success, false)
})

test('SendMessageRequestSchema rejects blank and oversized messages', () => {
  assert.equal(SendMessageRequestSchema.safeParse({ message: '   ' }).success, false)
  assert.equal(SendMessageRequestSchema.safeParse({ message: 'x'.repeat(2001) }).success, false)
  assert.equal(SendMessageRequestSchema.safeParse({ message: 'hello' }).success, true)
})

test('SendMessageRequestSchema keeps the message text as sent', () => {
  const parsed = SendMessageRequestSchema.safeParse({ message: '  hi  ' })
  assert.equal(parsed.success, true)
  if (!parsed.success) return
  assert.equal(parsed.data.message, '  hi  ')
})

test('FindPartnerRequestSchema accepts long interest lists', () => {
  const interests = Array.from({ length: 60 }, (_, index) => `topic-${index}`)
  const parsed = FindPartnerRequestSchema.safeParse({ interests })
  assert.equal(parsed.success, true)
  if (!parsed.success) return
  assert.equal(parsed.data.interests.length, 60)
})

test('signaling schemas pass opaque payloads through untouched', () => {
  const offer = { type: 'offer', sdp: 'v=0\r\n', extra: [1, 2, 3] }
  const parsed = VideoOfferSchema.safeParse({ offer })
  assert.equal(parsed.success, true)
  if (!parsed.success) return
  assert.deepEqual(parsed.data.offer, offer)
})

test('signaling schemas require the payload field', () => {
  assert.equal(IceCandidateSchema.safeParse({}).success, false)
  assert.equal(IceCandidateSchema.safeParse({ candidate: null }).success, false)
})

test('ReportReasonSchema accepts only the fixed reason codes', () => {
  assert.equal(ReportReasonSchema.safeParse('spam').success, true)
  assert.equal(ReportReasonSchema.safeParse('inappropriate_video').success, true)
  assert.equal(ReportReasonSchema.safeParse('rude').success, false)
})

test('ReportUserRequestSchema defaults comment to empty string', () => {
  const parsed = ReportUserRequestSchema.safeParse({ reported_id: 'sock-1', reason: 'spam' })
  assert.equal(parsed.success, true)
  if (!parsed.success) return
  assert.equal(parsed.data.comment, '')
})

test('BanStatusResponseSchema requires ban_end for active bans', () => {
  assert.equal(BanStatusResponseSchema.safeParse({ banned: true }).success, false)
  assert.equal(
    BanStatusResponseSchema.safeParse({
      banned: true,
      ban_end: '2030-01-01T00:00:00.000Z',
      reason: 'spam',
    }).success,
    true
  )
  assert.equal(BanStatusResponseSchema.safeParse({ banned: false }).success, true)
})

import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { TranscriptEntry } from '../room/transcripts'

export type TranscriptEvidence = {
  reportId: number
  reportedAddress: string
  reportedAt: Date
  entries: TranscriptEntry[]
}

export type TranscriptSink = {
  save: (evidence: TranscriptEvidence) => Promise<string>
}

const fileStamp = (date: Date) => date.toISOString().replace(/[:.]/g, '-')

export const formatTranscript = (evidence: TranscriptEvidence): string => {
  const lines = [
    `Report ID: ${evidence.reportId}`,
    `Reported address: ${evidence.reportedAddress}`,
    `Timestamp: ${evidence.reportedAt.toISOString()}`,
    'Conversation log:',
    '-'.repeat(50),
    ...evidence.entries.map((entry) => `[${entry.timestamp}] ${entry.sender}: ${entry.message}`),
  ]
  return `${lines.join('\n')}\n`
}

export const createFileTranscriptSink = (directory: string): TranscriptSink => ({
  save: async (evidence) => {
    await mkdir(directory, { recursive: true })
    const filename = `report_${evidence.reportId}_${fileStamp(evidence.reportedAt)}.txt`
    const filePath = path.join(directory, filename)
    await writeFile(filePath, formatTranscript(evidence), 'utf-8')
    return filePath
  },
})

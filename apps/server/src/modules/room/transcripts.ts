export type TranscriptSender = 'initiator' | 'responder'

export type TranscriptEntry = {
  sender: TranscriptSender
  message: string
  timestamp: string
}

type Transcript = {
  roomId: string
  createdAt: number
  closedAt?: number
  entries: TranscriptEntry[]
}

export type TranscriptCache = {
  open: (roomId: string) => void
  append: (roomId: string, entry: TranscriptEntry) => boolean
  close: (roomId: string) => void
  snapshot: (roomId: string) => TranscriptEntry[] | undefined
  evict: () => number
  size: () => number
}

type TranscriptCacheOptions = {
  maxAgeMs: number
  maxRooms: number
  now?: () => number
}

/**
 * Moderation evidence per room, kept in memory only. Closed transcripts live
 * for `maxAgeMs` after the room is torn down; the room cap is enforced on
 * every `open` as well as on `evict`.
 */
export const createTranscriptCache = (options: TranscriptCacheOptions): TranscriptCache => {
  const now = options.now ?? Date.now
  const transcripts = new Map<string, Transcript>()

  const enforceCap = (): number => {
    let evicted = 0
    if (transcripts.size <= options.maxRooms) return evicted

    // Insertion order is creation order: drop the oldest closed rooms first.
    for (const [roomId, transcript] of transcripts) {
      if (transcripts.size <= options.maxRooms) return evicted
      if (transcript.closedAt !== undefined) {
        transcripts.delete(roomId)
        evicted += 1
      }
    }
    for (const roomId of transcripts.keys()) {
      if (transcripts.size <= options.maxRooms) break
      transcripts.delete(roomId)
      evicted += 1
    }
    return evicted
  }

  return {
    open: (roomId) => {
      transcripts.set(roomId, { roomId, createdAt: now(), entries: [] })
      enforceCap()
    },
    append: (roomId, entry) => {
      const transcript = transcripts.get(roomId)
      if (!transcript || transcript.closedAt !== undefined) return false
      transcript.entries.push(entry)
      return true
    },
    close: (roomId) => {
      const transcript = transcripts.get(roomId)
      if (transcript && transcript.closedAt === undefined) {
        transcript.closedAt = now()
      }
    },
    snapshot: (roomId) => {
      const transcript = transcripts.get(roomId)
      return transcript ? transcript.entries.map((entry) => ({ ...entry })) : undefined
    },
    evict: () => {
      const cutoff = now() - options.maxAgeMs
      let evicted = 0
      for (const [roomId, transcript] of transcripts) {
        if (transcript.closedAt !== undefined && transcript.closedAt <= cutoff) {
          transcripts.delete(roomId)
          evicted += 1
        }
      }
      return evicted + enforceCap()
    },
    size: () => transcripts.size,
  }
}

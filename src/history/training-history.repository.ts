import type { HistoryQuery, NewTrainingHistoryEntry, TrainingHistoryEntry } from './training-history.types'

export abstract class TrainingHistoryRepository {
  abstract add(entry: NewTrainingHistoryEntry): Promise<TrainingHistoryEntry>
  /** Newest first. Without a limit, returns every entry of the user. */
  abstract listForUser(userId: number, query?: HistoryQuery): Promise<TrainingHistoryEntry[]>
  abstract countAll(): Promise<number>
}

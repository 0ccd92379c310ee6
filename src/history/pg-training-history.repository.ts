import { Injectable } from '@nestjs/common'
import { DatabaseService } from '../database/database.service'
import { muscleGroupSchema, trainingLevelSchema, volumeOutcomeSchema } from '../volume/volume.schema'
import { TrainingHistoryRepository } from './training-history.repository'
import type { HistoryQuery, NewTrainingHistoryEntry, TrainingHistoryEntry } from './training-history.types'

type TrainingHistoryRow = {
  id: number
  user_id: number
  muscle_group: string
  training_level: string
  current_sets: number
  progress: boolean
  recovered: boolean
  outcome: string
  target_sets: number | null
  message: string
  created_at: Date
}

const toEntry = (row: TrainingHistoryRow): TrainingHistoryEntry => ({
  id: row.id,
  userId: row.user_id,
  muscleGroup: muscleGroupSchema.parse(row.muscle_group),
  trainingLevel: trainingLevelSchema.parse(row.training_level),
  currentSets: row.current_sets,
  progress: row.progress,
  recovered: row.recovered,
  outcome: volumeOutcomeSchema.parse(row.outcome),
  targetSets: row.target_sets,
  message: row.message,
  createdAt: row.created_at,
})

@Injectable()
export class PgTrainingHistoryRepository extends TrainingHistoryRepository {
  constructor(private readonly db: DatabaseService) {
    super()
  }

  async add(entry: NewTrainingHistoryEntry): Promise<TrainingHistoryEntry> {
    const { rows } = await this.db.query<TrainingHistoryRow>(
      `INSERT INTO training_history
         (user_id, muscle_group, training_level, current_sets, progress, recovered, outcome, target_sets, message)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING *`,
      [
        entry.userId,
        entry.muscleGroup,
        entry.trainingLevel,
        entry.currentSets,
        entry.progress,
        entry.recovered,
        entry.outcome,
        entry.targetSets,
        entry.message,
      ],
    )
    const row = rows[0]
    if (!row) throw new Error('INSERT ... RETURNING produced no row')
    return toEntry(row)
  }

  async listForUser(userId: number, query: HistoryQuery = {}): Promise<TrainingHistoryEntry[]> {
    const params: unknown[] = [userId]
    let sql = `SELECT * FROM training_history WHERE user_id = $1`
    if (query.muscleGroup) {
      params.push(query.muscleGroup)
      sql += ` AND muscle_group = $${params.length}`
    }
    sql += ` ORDER BY created_at DESC, id DESC`
    if (query.limit !== undefined) {
      params.push(query.limit)
      sql += ` LIMIT $${params.length}`
    }

    const { rows } = await this.db.query<TrainingHistoryRow>(sql, params)
    return rows.map(toEntry)
  }

  async countAll(): Promise<number> {
    const { rows } = await this.db.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM training_history`)
    return rows[0]?.count ?? 0
  }
}

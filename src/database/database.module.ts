import { Global, Module } from '@nestjs/common'
import { PgTrainingHistoryRepository } from '../history/pg-training-history.repository'
import { TrainingHistoryRepository } from '../history/training-history.repository'
import { PgUsersRepository } from '../users/pg-users.repository'
import { UsersRepository } from '../users/users.repository'
import { DatabaseService } from './database.service'

@Global()
@Module({
  providers: [
    DatabaseService,
    { provide: UsersRepository, useClass: PgUsersRepository },
    { provide: TrainingHistoryRepository, useClass: PgTrainingHistoryRepository },
  ],
  exports: [DatabaseService, UsersRepository, TrainingHistoryRepository],
})
export class DatabaseModule {}

import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { errorMessage } from './common/errors';
import { DatabaseService } from './db/database.service';

const DB_CHECK_TIMEOUT_MS = 5000;

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('Database query timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(private databaseService: DatabaseService) {}

  @Get()
  @ApiOperation({ summary: 'Health check' })
  check() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  @Get('db')
  @ApiOperation({ summary: 'Database connectivity check (DbRouter read)' })
  async testDatabase() {
    try {
      const result = await withTimeout(
        this.databaseService.db.executeRead((db) =>
          db
            .selectFrom('study')
            .select(({ fn }) => [fn.count<string>('id').as('count')])
            .executeTakeFirst(),
        ),
        DB_CHECK_TIMEOUT_MS,
      );

      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        database: {
          connected: true,
          studyCount: Number(result?.count ?? 0),
        },
      };
    } catch (err) {
      return {
        status: 'error',
        timestamp: new Date().toISOString(),
        database: {
          connected: false,
          error: errorMessage(err),
        },
      };
    }
  }
}

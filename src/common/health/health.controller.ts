import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
  MemoryHealthIndicator,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';

/** Heap ceiling for the liveness probe */
const HEAP_LIMIT_BYTES = 200 * 1024 * 1024;

/**
 * Health endpoints, served outside the /api prefix and without authentication
 * Uses @nestjs/terminus, which answers 503 when a check fails
 */
@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly db: TypeOrmHealthIndicator,
  ) {}

  /**
   * Readiness: the task store must answer
   * @returns Terminus report with the `database` indicator
   * @throws ServiceUnavailableException (503) when the database ping fails
   */
  @Get()
  @HealthCheck()
  @ApiOperation({ summary: 'Readiness check' })
  @ApiResponse({ status: 200, description: 'Service is ready' })
  @ApiResponse({ status: 503, description: 'Database is unreachable' })
  check(): Promise<HealthCheckResult> {
    return this.health.check([() => this.db.pingCheck('database')]);
  }

  /**
   * Liveness: the process is responsive and its heap is bounded
   * @returns Terminus report with the `memory_heap` indicator
   * @throws ServiceUnavailableException (503) when the heap exceeds 200MB
   */
  @Get('live')
  @HealthCheck()
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: 200, description: 'Service is alive' })
  @ApiResponse({ status: 503, description: 'Service is not alive' })
  liveness(): Promise<HealthCheckResult> {
    return this.health.check([() => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)]);
  }
}

import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';

const SERVICE_VERSION = '1.0.0';

@Controller()
export class AppController {
  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'lot-ledger',
      version: SERVICE_VERSION,
    };
  }

  /**
   * API root - service info and entry points.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Lot Ledger API',
      version: SERVICE_VERSION,
      endpoints: {
        health: '/health',
        transactions: '/ledger/transactions',
        positions: '/ledger/accounts/:accountId/positions',
        snapshots: '/valuation/snapshots',
        prices: '/market-prices/:symbol',
      },
    };
  }
}

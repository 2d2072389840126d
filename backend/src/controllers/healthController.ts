import { Request, Response } from 'express';
import { SERVICE_NAME } from '../config/env';
import { AppServices } from '../container';

/**
 * Health Controller
 * Liveness, provider readiness and request counters
 */

export function createHealthController(services: AppServices) {
  const { config, metrics } = services;
  const mode = () => services.sms.channel;

  return {
    /**
     * GET /
     */
    root: (_req: Request, res: Response) => {
      res.json({ service: SERVICE_NAME, status: 'ok', mode: mode() });
    },

    /**
     * GET /healthz
     */
    healthz: (_req: Request, res: Response) => {
      res.json({
        mode: mode(),
        service: SERVICE_NAME,
        status: 'ok',
        twilio_ready: services.sms.channel === 'live',
        maps_ready: services.maps.mode === 'live',
        store: services.storeMode,
        uptime_seconds: metrics.uptimeSeconds(),
      });
    },

    /**
     * GET /metrics
     */
    metricsJson: (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        service: SERVICE_NAME,
        mode: mode(),
        uptime_seconds: metrics.uptimeSeconds(),
        healthz: metrics.snapshot(),
        sms: { twilio_ready: services.sms.channel === 'live' },
        build_id: config.buildId,
        region: config.region,
        git_commit: config.gitCommit,
        version: config.version,
      });
    },

    /**
     * GET /metrics.prom
     */
    metricsProm: (_req: Request, res: Response) => {
      res.type('text/plain; charset=utf-8').send(metrics.toPrometheus());
    },
  };
}

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { computeDerivatives, stationCodeSchema, type KIndexResult, type StationConfig } from '@geomag/kindex';

import { KIndexUnavailableError, StationNotFoundError, mapErrorToResponse } from '../errors';
import type { AppContext } from '../types';

const stationParamsSchema = z.object({
  code: stationCodeSchema
});

const toResultBody = (result: KIndexResult) => ({
  value: result.value,
  windowCenter: result.windowCenter.toISOString(),
  disturbance: result.disturbance
});

export const registerStationRoutes = (app: FastifyInstance, ctx: AppContext) => {
  const resolveStation = (params: unknown): StationConfig => {
    const { code } = stationParamsSchema.parse(params);
    const station = ctx.config.stations.find((entry) => entry.code === code);
    if (!station) {
      throw new StationNotFoundError(code);
    }
    return station;
  };

  app.get('/stations', async () => ({
    stations: ctx.config.stations.map((station) => {
      const report = ctx.store.get(station.code);
      return {
        code: station.code,
        name: report?.stationName ?? station.name ?? station.code,
        k9Limit: station.k9Limit,
        lenDays: station.lenDays,
        latest: report?.latest ? toResultBody(report.latest) : null,
        generatedAt: report ? report.generatedAt.toISOString() : null
      };
    })
  }));

  app.get('/stations/:code/kindex', async (request, reply) => {
    try {
      const station = resolveStation(request.params);
      const report = ctx.store.get(station.code);
      return {
        station: station.code,
        stationName: report?.stationName ?? station.name ?? station.code,
        components: report?.components ?? null,
        generatedAt: report ? report.generatedAt.toISOString() : null,
        results: report ? report.results.map(toResultBody) : []
      };
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }
  });

  app.get('/stations/:code/kindex/latest', async (request, reply) => {
    try {
      const station = resolveStation(request.params);
      const latest = ctx.store.get(station.code)?.latest;
      if (!latest) {
        throw new KIndexUnavailableError(station.code);
      }
      return { station: station.code, ...toResultBody(latest) };
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }
  });

  app.get('/stations/:code/windows', async (request, reply) => {
    try {
      const station = resolveStation(request.params);
      const report = ctx.store.get(station.code);
      return {
        station: station.code,
        windows: (report?.windows ?? []).map((window) => ({
          blockIndex: window.blockIndex,
          start: window.start.toISOString(),
          center: window.center.toISOString(),
          sampleCount: window.sampleCount,
          disturbance: window.disturbance
        }))
      };
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }
  });

  app.get('/stations/:code/derivatives', async (request, reply) => {
    try {
      const station = resolveStation(request.params);
      const report = ctx.store.get(station.code);
      const rows = report?.triplet ? computeDerivatives(report.samples, report.triplet) : [];
      return {
        station: station.code,
        rows: rows.map((row) => ({ ...row, timestamp: row.timestamp.toISOString() }))
      };
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }
  });

  app.post('/stations/:code/refresh', async (request, reply) => {
    const station = resolveStation(request.params);
    const report = await ctx.poller.runCycle(station.code);
    return reply.status(202).send({
      station: station.code,
      generatedAt: report.generatedAt.toISOString(),
      latest: report.latest ? toResultBody(report.latest) : null,
      rejectedFiles: report.files.rejected
    });
  });
};

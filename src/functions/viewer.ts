import express, { NextFunction, Request, Response } from 'express';
import { CatalogStore } from '../store/catalogStore';
import { RowFilter } from '../types';
import { errorCode, errorMessage, errorStack, QueryRejectedError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DEFAULT_PAGINATION, parsePositiveInteger, validatePagination } from '../utils/validator';
import {
  renderErrorPage,
  renderIndexPage,
  renderNotFoundPage,
  renderQueryPage,
  renderTablePage,
} from '../viewer/html';

/**
 * The parts of an express request the handlers read
 */
export interface ViewerRequest {
  params: Record<string, string>;
  query: Record<string, unknown>;
}

/**
 * The parts of an express response the handlers write
 */
export interface ViewerResponse {
  status(code: number): ViewerResponse;
  type(contentType: string): ViewerResponse;
  send(body: string): unknown;
  json(body: unknown): unknown;
}

export type ViewerHandler = (req: ViewerRequest, res: ViewerResponse) => void;

export interface ViewerOptions {
  store: CatalogStore;
}

export interface ErrorResponse {
  error: string;
  errors?: string[];
}

const DEFAULT_DATA_LIMIT = 1000;

/**
 * First string value of a query parameter
 */
export function queryValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function sendHtml(res: ViewerResponse, status: number, html: string): void {
  res.status(status).type('html').send(html);
}

function sendJson(res: ViewerResponse, status: number, body: unknown): void {
  res.status(status).json(body);
}

export function createIndexHandler(store: CatalogStore): ViewerHandler {
  return (_req, res) => {
    sendHtml(res, 200, renderIndexPage(store.listTables(), store.getDatabaseStats()));
  };
}

/**
 * HTML page of one table. Unknown names get a 404 page, never an empty table.
 */
export function createTableHandler(store: CatalogStore): ViewerHandler {
  return (req, res) => {
    const table = req.params.name ?? '';
    if (!store.hasTable(table)) {
      logger.info('viewer_table_not_found', { table });
      sendHtml(res, 404, renderNotFoundPage(table));
      return;
    }

    const pagination = validatePagination(
      queryValue(req.query.page),
      queryValue(req.query.pageSize)
    );
    if (!pagination.isValid) {
      sendHtml(res, 400, renderErrorPage('Invalid request', pagination.errors));
      return;
    }

    const filter: RowFilter = {
      participantId: queryValue(req.query.participant),
      sessionId: queryValue(req.query.session),
    };
    const totalRows = store.countRows(table, filter);
    const result = store.readRows(table, {
      ...filter,
      limit: pagination.pageSize,
      offset: (pagination.page - 1) * pagination.pageSize,
    });

    sendHtml(
      res,
      200,
      renderTablePage({
        table,
        result,
        totalRows,
        page: pagination.page,
        pageSize: pagination.pageSize,
        filter,
      })
    );
  };
}

/**
 * Ad-hoc read-only statement. Statements that could write and SQL the
 * engine rejects are answered with 400.
 */
export function createQueryHandler(store: CatalogStore): ViewerHandler {
  return (req, res) => {
    const sql = (queryValue(req.query.sql) ?? '').trim();
    if (sql === '') {
      sendHtml(res, 200, renderQueryPage('', null));
      return;
    }

    try {
      const result = store.runReadOnlyQuery(sql, [], DEFAULT_PAGINATION.maxPageSize);
      sendHtml(res, 200, renderQueryPage(sql, result));
    } catch (error) {
      if (!(error instanceof QueryRejectedError) && !errorCode(error)?.startsWith('SQLITE_')) {
        throw error;
      }
      logger.info('viewer_query_rejected', { reason: errorMessage(error) });
      sendHtml(res, 400, renderQueryPage(sql, null, [errorMessage(error)]));
    }
  };
}

export function createStatsHandler(store: CatalogStore): ViewerHandler {
  return (_req, res) => sendJson(res, 200, store.getDatabaseStats());
}

export function createTablesHandler(store: CatalogStore): ViewerHandler {
  return (_req, res) => sendJson(res, 200, store.listTables());
}

export function createParticipantsHandler(store: CatalogStore): ViewerHandler {
  return (_req, res) => sendJson(res, 200, store.getParticipants());
}

export function createSensorsHandler(store: CatalogStore): ViewerHandler {
  return (_req, res) => sendJson(res, 200, store.getSensors());
}

export function createSensorSummaryHandler(store: CatalogStore): ViewerHandler {
  return (req, res) => {
    const summary = store.getSensorSummary(req.params.name ?? '');
    if (!summary) {
      sendJson(res, 404, { error: 'Sensor not found or no data' } satisfies ErrorResponse);
      return;
    }
    sendJson(res, 200, summary);
  };
}

function readDataQuery(
  query: Record<string, unknown>
): { filter: RowFilter; limit: number } | { errors: string[] } {
  const limit = parsePositiveInteger(queryValue(query.limit), DEFAULT_DATA_LIMIT);
  if (limit === null || limit > DEFAULT_PAGINATION.maxPageSize * 10) {
    return { errors: ['limit must be a positive integer no larger than 10000'] };
  }
  return {
    filter: {
      participantId: queryValue(query.participant_id),
      sessionId: queryValue(query.session_id),
    },
    limit,
  };
}

export function createSensorDataHandler(store: CatalogStore): ViewerHandler {
  return (req, res) => {
    const request = readDataQuery(req.query);
    if ('errors' in request) {
      sendJson(res, 400, { error: 'Invalid request', errors: request.errors } satisfies ErrorResponse);
      return;
    }

    const data = store.getSensorData(req.params.name ?? '', request.filter, request.limit);
    if (!data) {
      sendJson(res, 404, { error: 'Sensor not found' } satisfies ErrorResponse);
      return;
    }
    sendJson(res, 200, data);
  };
}

export function createParticipantOverviewHandler(store: CatalogStore): ViewerHandler {
  return (req, res) => {
    const overview = store.getParticipantOverview(req.params.id ?? '');
    if (!overview) {
      sendJson(res, 404, { error: 'Participant not found' } satisfies ErrorResponse);
      return;
    }
    sendJson(res, 200, overview);
  };
}

/**
 * Generic lookup: type=participants | sensors | data (data needs sensor_name)
 */
export function createSearchHandler(store: CatalogStore): ViewerHandler {
  return (req, res) => {
    const type = queryValue(req.query.type) ?? 'participants';

    switch (type) {
      case 'participants':
        sendJson(res, 200, store.getParticipants());
        return;
      case 'sensors':
        sendJson(res, 200, store.getSensors());
        return;
      case 'data': {
        const sensorName = queryValue(req.query.sensor_name);
        if (!sensorName) {
          sendJson(res, 400, { error: 'sensor_name is required' } satisfies ErrorResponse);
          return;
        }
        const request = readDataQuery(req.query);
        if ('errors' in request) {
          sendJson(res, 400, { error: 'Invalid request', errors: request.errors } satisfies ErrorResponse);
          return;
        }
        const data = store.getSensorData(sensorName, request.filter, request.limit);
        if (!data) {
          sendJson(res, 404, { error: 'Sensor not found' } satisfies ErrorResponse);
          return;
        }
        sendJson(res, 200, data);
        return;
      }
      default:
        sendJson(res, 400, { error: 'Invalid query type' } satisfies ErrorResponse);
    }
  };
}

function route(handler: ViewerHandler) {
  return (req: Request, res: Response): void => handler(req, res);
}

/**
 * Read-only viewer over a catalog store. Every route is a GET.
 */
export function createViewerApp(options: ViewerOptions): express.Express {
  const { store } = options;
  const app = express();

  app.get('/', route(createIndexHandler(store)));
  app.get('/tables/:name', route(createTableHandler(store)));
  app.get('/query', route(createQueryHandler(store)));

  app.get('/api/stats', route(createStatsHandler(store)));
  app.get('/api/tables', route(createTablesHandler(store)));
  app.get('/api/participants', route(createParticipantsHandler(store)));
  app.get('/api/participants/:id/overview', route(createParticipantOverviewHandler(store)));
  app.get('/api/sensors', route(createSensorsHandler(store)));
  app.get('/api/sensors/:name/summary', route(createSensorSummaryHandler(store)));
  app.get('/api/sensors/:name/data', route(createSensorDataHandler(store)));
  app.get('/api/search', route(createSearchHandler(store)));

  app.use((req: Request, res: Response) => {
    if (req.path.startsWith('/api/')) {
      sendJson(res, 404, { error: 'Not found' } satisfies ErrorResponse);
    } else {
      sendHtml(res, 404, renderErrorPage('Not found', [`No page at ${req.path}`]));
    }
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error('viewer_request_error', {
      path: req.path,
      error: errorMessage(error),
      stack: errorStack(error),
    });
    if (req.path.startsWith('/api/')) {
      sendJson(res, 500, { error: 'Internal server error' } satisfies ErrorResponse);
    } else {
      sendHtml(res, 500, renderErrorPage('Internal server error', ['The page could not be rendered']));
    }
  });

  return app;
}

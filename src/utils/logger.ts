import winston from 'winston';
import { NextFunction, Request as ExpressRequest, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage, errorStack } from './errors';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

export interface RequestWithId extends ExpressRequest {
  id?: string;
  startTime?: number;
}

const { combine, timestamp, printf, colorize, errors, json, splat } = winston.format;

const serviceName = process.env.SERVICE_NAME || 'post-response-service';

const baseFormat = combine(
  timestamp(),
  errors({ stack: true }),
  splat(),
  winston.format(info => {
    info.service = serviceName;
    return info;
  })()
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: baseFormat,
  transports: [],
  defaultMeta: { service: serviceName },
  silent: process.env.NODE_ENV === 'test',
});

if (process.env.NODE_ENV !== 'production') {
  logger.add(new winston.transports.Console({
    format: combine(
      colorize(),
      printf(({ level, message, timestamp, service, correlationId, type, stack, ...rest }) => {
        let log = `${timestamp} [${service}] ${level}`;
        if (correlationId) log += ` [correlationId: ${correlationId}]`;
        if (type) log += ` [type: ${type}]`;
        log += `: ${message}`;

        const remainingMeta = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
        log += remainingMeta;

        if (stack) log += `\n${stack}`;
        return log;
      })
    ),
  }));
} else {
  logger.add(new winston.transports.Console({
    format: json(),
  }));
}

/**
 * Reuses the caller's correlation id when one is sent, otherwise mints a
 * UUID, and echoes it back on the response.
 */
export const assignCorrelationId = (req: RequestWithId, res: Response, next: NextFunction) => {
  const incomingId = req.headers['x-correlation-id'];
  req.id = typeof incomingId === 'string' && incomingId.length > 0 ? incomingId : uuidv4();
  res.setHeader(CORRELATION_ID_HEADER, req.id);
  next();
};

export const requestLogger = (req: RequestWithId, res: Response, next: NextFunction) => {
  req.startTime = Date.now();
  const correlationId = req.id;

  logger.info(`Incoming request`, {
    correlationId,
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    userAgent: req.headers['user-agent'],
    type: 'RequestLog.Start',
  });

  res.on('finish', () => {
    const duration = Date.now() - (req.startTime || Date.now());
    logger.info(`Request finished`, {
      correlationId,
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      durationMs: duration,
      type: 'RequestLog.Finish',
    });
  });

  res.on('error', (err) => {
    logger.error(`Error in response stream: ${err.message}`, {
      correlationId,
      method: req.method,
      url: req.originalUrl,
      error: err.message,
      type: 'RequestErrorLog',
    });
  });

  next();
};

export const logError = (err: unknown, req?: RequestWithId, messagePrefix?: string) => {
  const message = errorMessage(err);
  const errorMeta: Record<string, unknown> = {
    correlationId: req?.id,
    type: 'ApplicationErrorLog',
    stack: errorStack(err),
  };

  if (req) {
    errorMeta.request = {
      method: req.method,
      url: req.originalUrl,
      ip: req.ip,
    };
  }

  const finalMessage = messagePrefix ? `${messagePrefix}: ${message}` : message;
  logger.error(finalMessage, errorMeta);
};

export default logger;

import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WinstonModule } from 'nest-winston';
import * as winston from 'winston';
import { sanitizeFormat } from './log-sanitizer';
import { getRequestContext } from './request-context';

// Stamps the request's correlation id on every entry written while serving it
const correlationFormat = winston.format((info) => {
  const context = getRequestContext();
  if (context) {
    info.correlationId = context.correlationId;
  }
  return info;
});

@Global()
@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const isProduction = configService.get<string>('NODE_ENV') === 'production';

        return {
          level: isProduction ? 'info' : 'debug',
          format: winston.format.combine(
            winston.format.timestamp(),
            correlationFormat(),
            sanitizeFormat(),
            isProduction
              ? winston.format.json()
              : winston.format.combine(
                  winston.format.colorize(),
                  winston.format.printf(({ level, message, timestamp, correlationId, context, ...meta }) => {
                    const corrId = correlationId ? `[${String(correlationId).substring(0, 8)}]` : '';
                    const ctx = context ? `[${String(context)}]` : '';
                    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
                    return `${String(timestamp)} ${level} ${corrId}${ctx} ${String(message)} ${metaStr}`;
                  }),
                ),
          ),
          transports: [new winston.transports.Console()],
        };
      },
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}

export * from './exchange-rate-provider.interface';
export * from './frankfurter-exchange-rate.service';
export * from './mock-exchange-rate.service';

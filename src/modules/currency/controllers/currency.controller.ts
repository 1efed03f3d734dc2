import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { RequestSignal } from '../decorators/request-signal.decorator';
import {
  BulkConvertDto,
  ConvertQueryDto,
  HistoricalQueryDto,
  RateQueryDto,
  RatesQueryDto,
} from '../dto/currency.dto';
import { CurrencyService } from '../services/currency.service';
import { RateUpdaterService } from '../services/rate-updater.service';

@ApiTags('Currency')
@Controller('currency')
export class CurrencyController {
  constructor(
    private readonly currencyService: CurrencyService,
    private readonly rateUpdater: RateUpdaterService,
  ) {}

  @Get('convert')
  @ApiOperation({ summary: 'Convert an amount between two currencies' })
  async convert(@Query() query: ConvertQueryDto, @RequestSignal() signal: AbortSignal) {
    const options = { signal };
    const convertedAmount = await this.currencyService.convert(query.amount, query.from, query.to, options);
    const rate = await this.currencyService.getRate(query.from, query.to, options);

    return {
      success: true,
      originalAmount: query.amount,
      convertedAmount,
      fromCurrency: query.from,
      toCurrency: query.to,
      rate,
      rateDate: await this.currencyService.getRateDate(),
    };
  }

  @Post('bulk-convert')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Convert several amounts into one currency' })
  async bulkConvert(@Body() dto: BulkConvertDto, @RequestSignal() signal: AbortSignal) {
    const result = await this.currencyService.bulkConvert(dto.items, dto.to, { signal });
    return { success: true, ...result };
  }

  @Get('rates')
  @ApiOperation({ summary: 'All known rates for a base currency' })
  async getRates(@Query() query: RatesQueryDto, @RequestSignal() signal: AbortSignal) {
    const base = query.base ?? this.currencyService.baseCurrency;
    const rates = await this.currencyService.getAllRates(base, { signal });

    return { success: true, base, date: await this.currencyService.getRateDate(), rates };
  }

  @Get('rate')
  @ApiOperation({ summary: 'Exchange rate between two currencies' })
  async getRate(@Query() query: RateQueryDto, @RequestSignal() signal: AbortSignal) {
    const rate = await this.currencyService.getRate(query.from, query.to, { signal });

    return {
      success: true,
      fromCurrency: query.from,
      toCurrency: query.to,
      rate,
      date: await this.currencyService.getRateDate(),
    };
  }

  @Get('supported')
  @ApiOperation({ summary: 'Currencies the rate provider quotes' })
  async getSupportedCurrencies(@RequestSignal() signal: AbortSignal) {
    const currencies = await this.currencyService.getSupportedCurrencies({ signal });
    return { success: true, currencies };
  }

  @Get('historical')
  @ApiOperation({ summary: 'Rates published for a past date' })
  async getHistoricalRates(@Query() query: HistoricalQueryDto, @RequestSignal() signal: AbortSignal) {
    const base = query.base ?? this.currencyService.baseCurrency;
    const historical = await this.currencyService.getHistoricalRates(query.date, base, { signal });
    return { success: true, ...historical };
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Refresh rates from the provider now' })
  async refresh() {
    const result = await this.rateUpdater.forceUpdate();
    return { success: true, message: 'Exchange rates refreshed successfully', ...result };
  }

  @Get('status')
  @ApiOperation({ summary: 'Background rate updater status' })
  getStatus() {
    return { success: true, status: this.rateUpdater.getStatus() };
  }
}

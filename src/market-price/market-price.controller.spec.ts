import { Test, TestingModule } from '@nestjs/testing';
import { MarketPriceController } from './market-price.controller';
import { MarketPriceService } from './market-price.service';
import { PriceNotFoundError } from '../common/errors/ledger.errors';

describe('MarketPriceController', () => {
  let controller: MarketPriceController;
  let service: MarketPriceService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [MarketPriceController],
      providers: [MarketPriceService],
    }).compile();

    controller = module.get<MarketPriceController>(MarketPriceController);
    service = module.get<MarketPriceService>(MarketPriceService);
  });

  afterEach(() => {
    service.clearAllPrices();
  });

  it('should record a single close', () => {
    const result = controller.recordClose({ symbol: 'AAPL', date: '2023-01-03', price: 125 });

    expect(result.message).toBe('Close recorded for AAPL');
    expect(service.priceFor('AAPL', '2023-01-03')?.price).toBe(125);
  });

  it('should upper-case symbols in a bulk update', () => {
    const result = controller.recordCloses({ date: '2023-01-03', prices: { aapl: 125, msft: 240 } });

    expect(result.updatedSymbols).toEqual(['AAPL', 'MSFT']);
    expect(controller.getSymbols()).toEqual({ symbols: ['AAPL', 'MSFT'] });
  });

  it('should mark a backfilled quote as stale', () => {
    service.recordClose('AAPL', '2023-01-03', 125);

    expect(controller.getPrice('aapl', '2023-01-05')).toEqual({
      symbol: 'AAPL',
      requestedDate: '2023-01-05',
      price: 125,
      observedDate: '2023-01-03',
      isStale: true,
    });
  });

  it('should serve the latest close when no date is given', () => {
    service.recordClose('AAPL', '2023-01-03', 125);
    service.recordClose('AAPL', '2023-01-04', 127);

    expect(controller.getPrice('AAPL').isStale).toBe(false);
    expect(controller.getPrice('AAPL').price).toBe(127);
  });

  it('should throw when nothing is known for the symbol', () => {
    expect(() => controller.getPrice('MSFT', '2023-01-05')).toThrow(PriceNotFoundError);
  });
});

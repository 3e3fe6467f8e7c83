import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_ENGINE_CONFIG, loadConfig, loadDotenv, parseMode } from '../src/config';
import { configureLogger, logger } from '../src/utils/logger';

describe('config', () => {
  it('should use the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should read numbers, symbols and credentials', () => {
    const config = loadConfig({
      TRADING_MODE: 'LIVE',
      MIN_QUANTITY: '0.01',
      SUPPORTED_SYMBOLS: 'btcusdt, ethusdt,',
      TWAP_INTERVAL_UNIT_MS: '250',
      BINANCE_API_KEY: 'test-key',
      BINANCE_API_SECRET: 'test-secret',
    });

    expect(config.mode).toBe('live');
    expect(config.limits.minQuantity).toBe(0.01);
    expect(config.limits.symbols).toEqual(['BTCUSDT', 'ETHUSDT']);
    expect(config.intervalUnitMs).toBe(250);
    expect(config.live.apiKey).toBe('test-key');
    expect(config.live.apiSecret).toBe('test-secret');
  });

  it('should fall back on unparseable numbers', () => {
    const config = loadConfig({ STATUS_POLL_INTERVAL_MS: 'soon', MAX_API_RETRIES: '-1' });
    expect(config.statusPollIntervalMs).toBe(2000);
    expect(config.live.maxRetries).toBe(3);
  });

  it('should take whole numbers only where counts are expected', () => {
    const config = loadConfig({
      QUANTITY_PRECISION: '2.5',
      MAX_CONSECUTIVE_SLICE_FAILURES: '0',
      BINANCE_RECV_WINDOW: '0',
      MAX_API_RETRIES: '1.5',
    });

    expect(config.limits.quantityPrecision).toBe(3);
    expect(config.maxConsecutiveSliceFailures).toBe(3);
    expect(config.live.recvWindow).toBe(5000);
    expect(config.live.maxRetries).toBe(3);
    expect(loadConfig({ QUANTITY_PRECISION: '0', MAX_API_RETRIES: '0' }).limits.quantityPrecision).toBe(0);
  });

  it('should point the live gateway at the testnet on request', () => {
    expect(loadConfig({ BINANCE_TESTNET: 'true' }).live.baseUrl).toBe('https://testnet.binancefuture.com');
    expect(loadConfig({ BINANCE_TESTNET: 'true', BINANCE_BASE_URL: 'http://localhost:9000' }).live.baseUrl).toBe('http://localhost:9000');
    expect(loadConfig({}).live.baseUrl).toBe('https://fapi.binance.com');
  });

  it('should default unknown modes to sim', () => {
    expect(parseMode(undefined)).toBe('sim');
    expect(parseMode('paper')).toBe('sim');
    expect(parseMode(' live ')).toBe('live');
  });

  it('should apply logging settings found in the .env file', () => {
    const file = path.join(os.tmpdir(), `engine-${process.pid}-${Date.now()}.env`);
    fs.writeFileSync(file, 'LOG_LEVEL=debug\n');
    try {
      loadDotenv(file);
      expect(logger.level).toBe('debug');
    } finally {
      delete process.env.LOG_LEVEL;
      configureLogger();
      fs.rmSync(file, { force: true });
    }
    expect(logger.level).toBe('info');
  });
});

import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, parseAdminIds, parseList } from './config';

const required = { BOT_TOKEN: 'test-token', ADMIN_IDS: '1' };

describe('parseAdminIds', () => {
  it('drops blanks and non-numeric ids', () => {
    expect(parseAdminIds('1, 2,,abc, -3')).toEqual([1, 2]);
    expect(parseAdminIds(undefined)).toEqual([]);
  });
});

describe('parseList', () => {
  it('trims entries and skips empty ones', () => {
    expect(parseList(' a.com:443, b.com ,')).toEqual(['a.com:443', 'b.com']);
    expect(parseList(undefined)).toEqual([]);
  });
});

describe('loadConfig', () => {
  it('fills defaults', () => {
    expect(loadConfig(required)).toEqual({
      botToken: 'test-token',
      adminIds: [1],
      paymentProviderToken: '',
      databasePath: 'data/proxy.db',
      proxyServers: [],
      subscriptionPrice: 5,
      subscriptionCurrency: 'USD',
      subscriptionDays: 30,
      trialDays: 1,
      metricsHost: 'mtg-proxy',
      metricsPort: 8080,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...required,
      PAYMENT_PROVIDER_TOKEN: 'test-provider',
      PROXY_SERVERS: 'a.com:443,b.com',
      SUBSCRIPTION_PRICE: '299',
      SUBSCRIPTION_CURRENCY: 'rub',
      SUBSCRIPTION_DURATION: '14',
      TRIAL_DAYS: '0',
    });

    expect(config).toMatchObject({
      paymentProviderToken: 'test-provider',
      proxyServers: ['a.com:443', 'b.com'],
      subscriptionPrice: 299,
      subscriptionCurrency: 'RUB',
      subscriptionDays: 14,
      trialDays: 0,
    });
  });

  it('requires a token and at least one admin', () => {
    expect(() => loadConfig({ ADMIN_IDS: '1' })).toThrow(ConfigError);
    expect(() => loadConfig({ BOT_TOKEN: 'test-token', ADMIN_IDS: 'abc' })).toThrow(
      'BOT_TOKEN и ADMIN_IDS обязательны в .env',
    );
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ ...required, SUBSCRIPTION_PRICE: 'abc' })).toThrow(
      'SUBSCRIPTION_PRICE должен быть числом, получено "abc"',
    );
    expect(() => loadConfig({ ...required, SUBSCRIPTION_PRICE: '0' })).toThrow(
      'SUBSCRIPTION_PRICE должен быть больше нуля',
    );
    expect(() => loadConfig({ ...required, SUBSCRIPTION_DURATION: '0' })).toThrow(
      'SUBSCRIPTION_DURATION должен быть целым числом ≥ 1',
    );
    expect(() => loadConfig({ ...required, TRIAL_DAYS: '1.5' })).toThrow('TRIAL_DAYS должен быть целым числом ≥ 0');
  });
});

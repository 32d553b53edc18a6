import { expect } from 'chai';
import { mergeCliConf, parseConfig } from '../../src/shared/config.js';
import { configDefault } from '../../src/shared/defaults.js';

describe('config', () => {
  describe('parseConfig', () => {
    it('should layer file values over the defaults', () => {
      const config = parseConfig({ preview: { maxTtlHours: 48, image: 'httpd:2.4' } });

      expect(config.preview.maxTtlHours).to.equal(48);
      expect(config.preview.image).to.equal('httpd:2.4');
      expect(config.preview.minTtlHours).to.equal(configDefault.preview.minTtlHours);
      expect(config.server).to.deep.equal(configDefault.server);
    });

    it('should accept an empty file', () => {
      expect(parseConfig(null)).to.deep.equal(parseConfig({}));
    });

    it('should reject a minimum TTL above the maximum', () => {
      expect(() => parseConfig({ preview: { minTtlHours: 10, maxTtlHours: 2 } })).to.throw(
        'Invalid configuration: preview.minTtlHours: preview.minTtlHours must not exceed preview.maxTtlHours',
      );
    });

    it('should reject unknown backends', () => {
      expect(() => parseConfig({ storage: 'sqlite' })).to.throw(/^Invalid configuration: storage: /);
    });

    it('should reject a file that is not a mapping', () => {
      expect(() => parseConfig(['server'])).to.throw('Config file must contain a mapping at the top level');
    });
  });

  describe('mergeCliConf', () => {
    it('should let command line flags win', () => {
      const config = mergeCliConf(
        { port: 9000, scheduler: 'bullmq', redisUrl: 'redis://cache:6379', logLevel: 'debug' },
        configDefault,
      );

      expect(config.server.port).to.equal(9000);
      expect(config.server.host).to.equal(configDefault.server.host);
      expect(config.scheduler).to.deep.equal({ driver: 'bullmq', queueName: configDefault.scheduler.queueName });
      expect(config.redis.url).to.equal('redis://cache:6379');
      expect(config.logLevel).to.equal('debug');
    });

    it('should leave the config untouched without flags', () => {
      expect(mergeCliConf({}, configDefault)).to.deep.equal(configDefault);
    });
  });
});

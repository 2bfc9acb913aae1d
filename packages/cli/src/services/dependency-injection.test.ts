import { NotFoundError } from '@confstore/core';
import type { MemoryData } from '@confstore/core/memory';
import { DependencyInjectionService, parseScope } from './dependency-injection';

describe('DependencyInjectionService', () => {
  describe('parseScope', () => {
    it('should split the app from its namespaces', () => {
      expect(parseScope('myapp')).toEqual({ app: 'myapp', namespaces: [] });
      expect(parseScope('myapp/prod/eu')).toEqual({ app: 'myapp', namespaces: ['prod', 'eu'] });
    });

    it('should reject empty segments', () => {
      expect(() => parseScope('')).toThrow('invalid scope ""');
      expect(() => parseScope('myapp//prod')).toThrow('invalid scope "myapp//prod"');
      expect(() => parseScope('/prod')).toThrow('invalid scope "/prod"');
    });
  });

  describe('openStore', () => {
    const service = DependencyInjectionService.getInstance();

    afterEach(async () => {
      await service.close();
    });

    it('should return the same instance', () => {
      expect(DependencyInjectionService.getInstance()).toBe(service);
    });

    it('should open stores of the configured backend', async () => {
      const memoryData: MemoryData = new Map();
      service.configure({ backend: 'memory', memory: { format: 'json' } }, { memoryData });

      const store = await service.openStore('myapp/prod');
      await store.marshal('server', { port: 8080 });

      expect(service.isConfigured()).toBe(true);
      expect(memoryData.get('myapp/prod')?.has('server.json')).toBe(true);
    });

    it('should reuse the configuration after close', async () => {
      const memoryData: MemoryData = new Map();
      service.configure({ backend: 'memory' }, { memoryData });
      await (await service.openStore('myapp')).marshal('a', { x: 1 });
      await service.close();

      const target = {};
      await (await service.openStore('myapp')).unmarshal('a', target);
      expect(target).toEqual({ x: 1 });
    });

    it('should surface not-found errors from the store', async () => {
      service.configure({ backend: 'memory' });
      const store = await service.openStore('myapp');

      await expect(store.unmarshal('missing', {})).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should validate options when configured', () => {
      expect(() => service.configure({ backend: 'memory', memory: { mode: 'multi', format: 'json' } }))
        .toThrow('a default format only applies to the "simple" mode');
    });
  });
});

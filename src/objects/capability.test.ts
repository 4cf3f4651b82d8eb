import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FakeDashboards } from '../../tests/utils/fake-dashboards';
import { makeProfile } from '../../tests/utils/test-helpers';
import { createServerTarget } from '../targets';
import type { FetchFn } from '../transport/http';
import { DashboardsHttp } from '../transport/http';
import { classifyCapability, detectBackend, resetCapabilityCache } from './capability';

const CHECK_URL = 'http://local.test:9200/api/saved_objects/_find?per_page=1&type=index-pattern';

describe('objects/capability', () => {
  const target = createServerTarget(makeProfile('local'), true);

  beforeEach(() => {
    resetCapabilityCache();
  });

  describe('classifyCapability', () => {
    const base = { text: '', url: CHECK_URL };

    it('should accept a find response', () => {
      expect(classifyCapability({ ...base, status: 200, body: { saved_objects: [], total: 0 } })).toEqual(
        { mode: 'ModernApi' },
      );
    });

    it("should accept the dashboards application's own 404", () => {
      const body = { statusCode: 404, error: 'Not Found', message: 'Not Found' };
      expect(classifyCapability({ ...base, status: 404, body }).mode).toBe('ModernApi');
    });

    it('should fall back for a bare 404', () => {
      expect(classifyCapability({ ...base, status: 404, body: undefined })).toEqual({
        mode: 'LegacyIndex',
        warning: `Saved objects API not available at ${CHECK_URL} (HTTP 404); using the legacy index`,
      });
    });

    it('should fall back for an unrecognised 200 body', () => {
      const detection = classifyCapability({ ...base, status: 200, body: { cluster_name: 'x' } });
      expect(detection.mode).toBe('LegacyIndex');
      expect(detection.warning).toContain('(unrecognised response body (HTTP 200))');
    });
  });

  describe('detectBackend', () => {
    it('should check once per target and cache the decision', async () => {
      const fake = new FakeDashboards();
      const http = new DashboardsHttp(target, fake.fetch, 1000);

      const first = await detectBackend(target, http);
      const second = await detectBackend(target, http);

      expect(first).toEqual({ mode: 'ModernApi' });
      expect(second).toEqual(first);
      expect(fake.requests).toHaveLength(1);
    });

    it('should share one check between concurrent callers', async () => {
      const fake = new FakeDashboards();
      const http = new DashboardsHttp(target, fake.fetch, 1000);

      await Promise.all([detectBackend(target, http), detectBackend(target, http)]);

      expect(fake.requests).toHaveLength(1);
    });

    it('should fall back to the legacy index on 5xx', async () => {
      const fake = new FakeDashboards();
      fake.unavailableStatus = 503;
      const http = new DashboardsHttp(target, fake.fetch, 1000);

      expect(await detectBackend(target, http)).toEqual({
        mode: 'LegacyIndex',
        warning: `Saved objects API not available at ${CHECK_URL} (HTTP 503); using the legacy index`,
      });
    });

    it('should fall back when the dashboards application is unreachable', async () => {
      const fetchFn = vi.fn<FetchFn>().mockRejectedValue(new Error('connect ECONNREFUSED'));
      const http = new DashboardsHttp(target, fetchFn, 1000);

      const detection = await detectBackend(target, http);

      expect(detection.mode).toBe('LegacyIndex');
      expect(detection.warning).toBe(
        `Saved objects API not reachable for 'local' (Request to ${CHECK_URL} failed: connect ECONNREFUSED); using the legacy index`,
      );
    });

    it('should check again after the cache is reset', async () => {
      const fake = new FakeDashboards();
      const http = new DashboardsHttp(target, fake.fetch, 1000);

      await detectBackend(target, http);
      resetCapabilityCache();
      await detectBackend(target, http);

      expect(fake.requests).toHaveLength(2);
    });
  });
});

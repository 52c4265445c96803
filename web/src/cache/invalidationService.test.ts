import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidationService } from './InvalidationService';
import { ResponseCache } from './ResponseCache';

describe('InvalidationService', () => {
  let cache: ResponseCache;
  let service: InvalidationService;

  beforeEach(() => {
    cache = new ResponseCache();
    service = new InvalidationService(cache);
    service.register('feedback', '/api/v1/feedback', ['/api/v1/feedback/member/']);
    service.register('member', '/api/v1/members');

    cache.set('/api/v1/feedback?page=1', 1);
    cache.set('/api/v1/feedback/stats?', 2);
    cache.set('/api/v1/feedback/search?q=late', 3);
    cache.set('/api/v1/feedback/f1?', 4);
    cache.set('/api/v1/feedback/f2?', 5);
    cache.set('/api/v1/feedback/member/m1?', 6);
    cache.set('/api/v1/members?', 7);
  });

  it('should list the prefixes an update makes stale', () => {
    expect(service.prefixesFor('feedback', 'f1')).toEqual([
      '/api/v1/feedback?',
      '/api/v1/feedback/stats?',
      '/api/v1/feedback/search?',
      '/api/v1/feedback/member/',
      '/api/v1/feedback/f1?',
    ]);
    expect(service.prefixesFor('unknown')).toEqual([]);
  });

  it('should drop collection reads and the changed record only', () => {
    expect(service.onChange('feedback', 'updated', 'f1')).toBe(5);
    expect(cache.keys()).toEqual(['/api/v1/feedback/f2?', '/api/v1/members?']);
  });

  it('should keep single records on bulk operations', () => {
    service.onChange('feedback', 'bulk-operation', 'f1');
    expect(cache.keys()).toEqual(['/api/v1/feedback/f1?', '/api/v1/feedback/f2?', '/api/v1/members?']);
  });

  it('should drop everything under registered roots on reconnect', () => {
    cache.set('/api/v1/other?', 8);
    expect(service.onReconnect()).toBe(7);
    expect(cache.keys()).toEqual(['/api/v1/other?']);
  });
});

import { describe, it, expect } from 'vitest';
import { ErrorKind } from '../client/errors';
import { createServiceHarness, failure, FIXED_NOW, jsonResponse } from '../test/harness';
import { canTransition, decodeMember } from './memberService';

const MEMBERS = '/api/v1/members';

function memberRaw(id: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    first_name: 'John',
    last_name: 'Doe',
    email: 'john@x.com',
    employment_status: 'active',
    version: 1,
    ...overrides,
  };
}

function sentBody(init: { body?: string }): unknown {
  return JSON.parse(init.body ?? 'null');
}

describe('decodeMember', () => {
  it('should compute full name and tenure', () => {
    const member = decodeMember(
      { id: 'm2', first_name: 'Ada', last_name: 'Lovelace', email: 'ada@x.com', hire_date: '2020-06-15' },
      FIXED_NOW,
    );

    expect(member.full_name).toBe('Ada Lovelace');
    expect(member.tenure_years).toBe(5);
    expect(member.employment_status).toBe('active');
    expect(member.employment_type).toBe('full_time');
    expect(member.version).toBe(1);
  });

  it('should report zero tenure without a hire date', () => {
    expect(decodeMember(memberRaw('m1'), FIXED_NOW).tenure_years).toBe(0);
  });
});

describe('MemberService create', () => {
  it('should post the validated member and cache it for getById', async () => {
    const { members, fetchMock } = createServiceHarness();
    fetchMock.mockResolvedValueOnce(jsonResponse(201, memberRaw('m1')));

    const created = await members.create({ first_name: 'John', last_name: 'Doe', email: 'john@x.com' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://gateway.test/api/v1/members');
    expect(init.method).toBe('POST');
    expect(sentBody(init)).toEqual({ first_name: 'John', last_name: 'Doe', email: 'john@x.com' });
    expect(created.id).toBe('m1');
    expect(created.full_name).toBe('John Doe');

    const again = await members.getById('m1');
    expect(again).toEqual(created);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should swap the placeholder for the saved record', async () => {
    const { members, fetchMock } = createServiceHarness();
    fetchMock.mockResolvedValueOnce(jsonResponse(201, memberRaw('m1')));

    await members.create({ first_name: 'John', last_name: 'Doe', email: 'john@x.com' });

    expect(members.collection.snapshot().map((record) => [record.value.id, record.optimistic])).toEqual([
      ['m1', false],
    ]);
  });

  it('should reject invalid input without a network call', async () => {
    const { members, fetchMock } = createServiceHarness();

    const error = await failure(members.create({ first_name: 'J', last_name: 'Doe', email: 'not-an-email' }));

    expect(error.kind).toBe(ErrorKind.VALIDATION);
    expect(error.fieldErrors.map((fieldError) => fieldError.field)).toEqual(['email', 'first_name']);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(members.collection.size).toBe(0);
  });

  it('should reject a negative salary and a malformed phone', async () => {
    const { members } = createServiceHarness();

    const error = await failure(
      members.create({ first_name: 'John', last_name: 'Doe', email: 'john@x.com', phone: 'call me', salary: -1 }),
    );

    expect(error.fieldErrors).toEqual([
      { field: 'phone', message: 'Invalid phone number format' },
      { field: 'salary', message: 'Salary cannot be negative' },
    ]);
  });

  it('should send the hire date as a calendar date', async () => {
    const { members, fetchMock } = createServiceHarness();
    fetchMock.mockResolvedValueOnce(jsonResponse(201, memberRaw('m1', { hire_date: '2024-01-08' })));

    await members.create({
      first_name: ' John ',
      last_name: 'Doe',
      email: 'John@X.com',
      hire_date: new Date(2024, 0, 8),
    });

    expect(sentBody(fetchMock.mock.calls[0][1])).toEqual({
      first_name: 'John',
      last_name: 'Doe',
      email: 'john@x.com',
      hire_date: '2024-01-08',
    });
  });
});

describe('MemberService update', () => {
  it('should fail fast with CONFLICT when the cached version differs', async () => {
    const { members, fetchMock } = createServiceHarness();
    fetchMock.mockResolvedValueOnce(jsonResponse(200, memberRaw('m1', { version: 2 })));
    await members.getById('m1');

    const error = await failure(members.update('m1', { job_title: 'Lead' }, { version: 1 }));

    expect(error.kind).toBe(ErrorKind.CONFLICT);
    expect(error.details).toEqual({ id: 'm1', expectedVersion: 1, currentVersion: 2 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should empty the list cache after a successful update', async () => {
    const { members, fetchMock, cache } = createServiceHarness();
    fetchMock
      .mockResolvedValueOnce(jsonResponse(200, { items: [memberRaw('m1')], total: 1, page: 1, limit: 20 }))
      .mockResolvedValueOnce(jsonResponse(200, memberRaw('m1', { version: 2, job_title: 'Lead' })))
      .mockResolvedValueOnce(jsonResponse(200, { items: [memberRaw('m1', { version: 2 })], total: 1, page: 1, limit: 20 }));

    await members.list({ page: 1 });
    expect(cache.keys()).toEqual([`${MEMBERS}?page=1`]);

    const saved = await members.update('m1', { job_title: 'Lead' }, { version: 1 });

    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe('https://gateway.test/api/v1/members/m1');
    expect(init.method).toBe('PATCH');
    expect(init.headers['If-Match']).toBe('"1"');
    expect(sentBody(init)).toEqual({ job_title: 'Lead', version: 1 });
    expect(saved.version).toBe(2);
    expect(cache.keys().filter((key) => key.startsWith(`${MEMBERS}?`))).toEqual([]);
    expect(cache.keys()).toEqual([`${MEMBERS}/m1?`]);

    const page = await members.list({ page: 1 });
    expect(page.items[0].version).toBe(2);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should restore the local collection when the server rejects the update', async () => {
    const { members, fetchMock } = createServiceHarness();
    fetchMock
      .mockResolvedValueOnce(jsonResponse(200, { items: [memberRaw('m1')], total: 1, page: 1, limit: 20 }))
      .mockResolvedValueOnce(jsonResponse(409, { detail: 'Version mismatch' }));
    await members.list({});
    const before = members.collection.snapshot();

    const error = await failure(members.update('m1', { job_title: 'Lead' }));

    expect(error.kind).toBe(ErrorKind.CONFLICT);
    expect(error.message).toBe('Version mismatch');
    expect(members.collection.snapshot()).toEqual(before);
  });
});

describe('MemberService updateStatus', () => {
  it('should send an allowed transition', async () => {
    const { members, fetchMock } = createServiceHarness();
    fetchMock
      .mockResolvedValueOnce(jsonResponse(200, memberRaw('m1')))
      .mockResolvedValueOnce(jsonResponse(200, memberRaw('m1', { employment_status: 'on_leave', version: 2 })));

    const updated = await members.updateStatus('m1', {
      status: 'on_leave',
      reason: 'Parental <leave>',
      effectiveDate: new Date(2026, 2, 15),
    });

    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe('https://gateway.test/api/v1/members/m1/status');
    expect(init.method).toBe('PUT');
    expect(sentBody(init)).toEqual({ new_status: 'on_leave', reason: 'Parental leave', effective_date: '2026-03-15' });
    expect(updated.employment_status).toBe('on_leave');
  });

  it('should refuse to leave a terminal status', async () => {
    const { members, fetchMock } = createServiceHarness();
    fetchMock.mockResolvedValueOnce(jsonResponse(200, memberRaw('m1', { employment_status: 'terminated' })));

    const error = await failure(members.updateStatus('m1', { status: 'active' }));

    expect(error.kind).toBe(ErrorKind.VALIDATION);
    expect(error.code).toBe('INVALID_STATUS_TRANSITION');
    expect(error.message).toBe('Cannot change status from terminated to active');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should follow the transition table', () => {
    expect(canTransition('probation', 'active')).toBe(true);
    expect(canTransition('on_leave', 'retired')).toBe(false);
    expect(canTransition('retired', 'active')).toBe(false);
  });
});

describe('MemberService checkEmailAvailability', () => {
  it('should query the normalised address without caching', async () => {
    const { members, fetchMock, cache } = createServiceHarness();
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { available: true }));

    await expect(members.checkEmailAvailability(' New@x.com ')).resolves.toBe(true);
    expect(fetchMock.mock.calls[0][0]).toBe('https://gateway.test/api/v1/members/check-email?email=new%40x.com');
    expect(cache.keys()).toEqual([]);
  });
});

import { MemoryAttendanceStore, MemoryDeviceRegistryStore, MemorySessionStore } from '@/repositories/memory.repository';

describe('MemorySessionStore', () => {
  it('assigns sequential positive ids and filters by status', async () => {
    const sessions = new MemorySessionStore();
    const first = await sessions.create({ classroomSegment: '10.0.5.', label: null, startsAt: null, endsAt: null });
    const second = await sessions.create({ classroomSegment: '10.0.6.', label: 'Biology', startsAt: null, endsAt: null });
    await sessions.close(first.id, new Date('2026-03-02T10:00:00.000Z'));

    expect([first.id, second.id]).toEqual([1, 2]);
    await expect(sessions.list({ status: 'OPEN' })).resolves.toMatchObject([{ id: 2, label: 'Biology' }]);
    await expect(sessions.list({})).resolves.toHaveLength(2);
  });

  it('keeps the first closedAt when a session is closed twice', async () => {
    const sessions = new MemorySessionStore();
    const { id } = await sessions.create({ classroomSegment: '10.0.5.', label: null, startsAt: null, endsAt: null });

    await sessions.close(id, new Date('2026-03-02T10:00:00.000Z'));
    const again = await sessions.close(id, new Date('2026-03-02T11:00:00.000Z'));

    expect(again).toMatchObject({ status: 'CLOSED', closedAt: new Date('2026-03-02T10:00:00.000Z') });
    await expect(sessions.close(42, new Date())).resolves.toBeNull();
  });
});

describe('MemoryAttendanceStore', () => {
  const entry = {
    studentId: 'alice',
    sessionId: 1,
    deviceIdentifier: 'AA:BB:CC:DD:EE:FF',
    networkAddress: '10.0.5.23',
    checkedInAt: new Date('2026-03-02T09:00:00.000Z'),
  };

  it('inserts once per student and session and returns the original afterwards', async () => {
    const attendance = new MemoryAttendanceStore();

    const first = await attendance.insertIfAbsent(entry);
    const second = await attendance.insertIfAbsent({ ...entry, checkedInAt: new Date('2026-03-02T09:05:00.000Z') });

    expect(first.created).toBe(true);
    expect(second).toEqual({ created: false, record: first.record });
  });

  it('lists a student newest first and a session in arrival order', async () => {
    const attendance = new MemoryAttendanceStore();
    await attendance.insertIfAbsent(entry);
    await attendance.insertIfAbsent({ ...entry, sessionId: 2, checkedInAt: new Date('2026-03-03T09:00:00.000Z') });
    await attendance.insertIfAbsent({ ...entry, studentId: 'bob', checkedInAt: new Date('2026-03-02T08:59:00.000Z') });

    const mine = await attendance.listByStudent('alice');
    const session = await attendance.listBySession(1);

    expect(mine.map((record) => record.sessionId)).toEqual([2, 1]);
    expect(session.map((record) => record.studentId)).toEqual(['bob', 'alice']);
  });
});

describe('MemoryDeviceRegistryStore', () => {
  const registeredAt = new Date('2026-03-02T08:00:00.000Z');

  it('keeps one owner per device and moves it on re-registration', async () => {
    const devices = new MemoryDeviceRegistryStore();
    await devices.register({ deviceIdentifier: 'AA:BB:CC:DD:EE:FF', studentId: 'alice', registeredAt });
    await devices.register({ deviceIdentifier: '11:22:33:44:55:66', studentId: 'alice', registeredAt });

    await devices.register({ deviceIdentifier: 'AA:BB:CC:DD:EE:FF', studentId: 'bob', registeredAt });

    await expect(devices.findByDevice('AA:BB:CC:DD:EE:FF')).resolves.toEqual({
      deviceIdentifier: 'AA:BB:CC:DD:EE:FF',
      studentId: 'bob',
      registeredAt,
    });
    await expect(devices.list({ studentId: 'alice' })).resolves.toEqual([
      { deviceIdentifier: '11:22:33:44:55:66', studentId: 'alice', registeredAt },
    ]);
    await expect(devices.remove('AA:BB:CC:DD:EE:FF')).resolves.toBe(true);
    await expect(devices.remove('AA:BB:CC:DD:EE:FF')).resolves.toBe(false);
  });
});

import { GeoPoint, StaffMember, TicketAttributes } from '@ticket-dispatch/shared-models';
import { InconsistentStateError } from '../errors/inconsistent-state.error';
import { haversineKm } from '../facilities/haversine';
import { staffLockKey } from '../staff/staff-roster.service';
import { createTestEngine, makeStaff, makeTicket } from '../../testing/fixtures';

function roster(): StaffMember[] {
  return [
    makeStaff('AK-1', 'Актау', { skills: ['VIP', 'ENG'], currentLoad: 1 }),
    makeStaff('AK-2', 'Актау', { skills: ['VIP', 'ENG'], position: 'SENIOR_SPECIALIST', currentLoad: 1 }),
    makeStaff('AK-3', 'Актау'),
    makeStaff('AS-1', 'Астана', { skills: ['VIP', 'KZ'], position: 'CHIEF_SPECIALIST', currentLoad: 3 }),
    makeStaff('AS-2', 'Астана', { skills: ['KZ'], currentLoad: 2 }),
    makeStaff('AL-1', 'Алматы', { skills: ['VIP', 'ENG', 'KZ'], position: 'CHIEF_SPECIALIST', currentLoad: 4 }),
    makeStaff('KR-1', 'Караганда')
  ];
}

function totalLoad(members: StaffMember[]): number {
  return members.reduce((sum, m) => sum + m.currentLoad, 0);
}

describe('AssignmentOrchestratorService', () => {
  it('routes a VIP English ticket from Aktau to the local VIP+ENG pair, alternating', async () => {
    const provider = jest.fn<Promise<GeoPoint | null>, [string]>().mockResolvedValue(null);
    const { orchestrator } = createTestEngine({ staff: roster(), provider });
    const ticket = (id: string) =>
      makeTicket({ ticketId: id, segment: 'VIP', language: 'ENG', city: 'Aktau' });

    const results = [];
    for (const id of ['T-1', 'T-2', 'T-3', 'T-4']) {
      results.push(await orchestrator.process(ticket(id)));
    }

    expect(results.map((r) => r.staffId)).toEqual(['AK-1', 'AK-2', 'AK-1', 'AK-2']);
    expect(results[0]).toEqual(
      expect.objectContaining({
        status: 'ASSIGNED',
        facility: 'Актау',
        staffName: 'Manager AK-1',
        fingerprint: 'Актау|vip=true|data=false|lang=ENG|senior=false',
        routingBasis: 'CITY_SHORTCUT',
        location: { kind: 'resolved', tier: 'FACILITY_CITY', lat: 43.6356, lon: 51.1683 },
        note: null,
        reason: null,
        distanceToAssignedKm: 0
      })
    );
    expect(provider).not.toHaveBeenCalled();
  });

  it('falls back to the offline table when the provider answers outside the service area', async () => {
    const provider = jest
      .fn<Promise<GeoPoint | null>, [string]>()
      .mockResolvedValue({ lat: 55.75, lon: 37.62 });
    const { orchestrator } = createTestEngine({ staff: roster(), provider });

    const result = await orchestrator.process(
      makeTicket({ segment: 'VIP', language: 'ENG', city: 'Жанаозен', region: 'Mangystau' })
    );

    expect(provider.mock.calls).toEqual([
      ['Жанаозен, Мангистауская, Казахстан'],
      ['Мангистауская, Казахстан']
    ]);
    expect(result).toEqual(
      expect.objectContaining({
        status: 'ASSIGNED',
        facility: 'Актау',
        staffId: 'AK-1',
        routingBasis: 'DISTANCE',
        location: { kind: 'resolved', tier: 'TABLE_EXACT', lat: 43.6415, lon: 51.1727 },
        geoNearestFacility: 'Актау',
        distanceToNearestKm: 0.7,
        distanceToAssignedKm: 0.7
      })
    );
  });

  it('is deterministic for the same roster and ticket sequence', async () => {
    const tickets: TicketAttributes[] = [
      makeTicket({ ticketId: 'T-1', city: 'Актау' }),
      makeTicket({ ticketId: 'T-2', city: 'Актау', sentiment: 'NEGATIVE' }),
      makeTicket({ ticketId: 'T-3', region: 'Неизвестная' }),
      makeTicket({ ticketId: 'T-4', language: 'KZ', city: 'Караганда' }),
      makeTicket({ ticketId: 'T-5', country: 'Россия' })
    ];

    const run = async () => {
      const { orchestrator } = createTestEngine({ staff: roster() });
      const picks: Array<[string | null, string | null]> = [];
      for (const ticket of tickets) {
        const result = await orchestrator.process(ticket);
        picks.push([result.facility, result.staffId]);
      }
      return picks;
    };

    const first = await run();

    expect(await run()).toEqual(first);
    expect(first).toEqual([
      ['Актау', 'AK-3'],
      ['Актау', 'AK-2'],
      ['Астана', 'AS-2'],
      ['Астана', 'AS-1'],
      ['Алматы', 'AL-1']
    ]);
  });

  it('conserves load: one increment per assigned ticket', async () => {
    const { orchestrator, roster: ledger } = createTestEngine({ staff: roster() });
    const before = totalLoad(ledger.getAll());

    const results = [];
    for (let i = 0; i < 12; i++) {
      results.push(
        await orchestrator.process(
          makeTicket({
            ticketId: `T-${i}`,
            segment: i % 3 === 0 ? 'VIP' : 'Mass',
            language: i % 4 === 0 ? 'KZ' : 'RU',
            city: i % 2 === 0 ? 'Актау' : 'Караганда',
            ticketType: i === 7 ? 'SPAM' : 'CONSULTATION'
          })
        )
      );
    }

    const assigned = results.filter((r) => r.status === 'ASSIGNED').length;
    expect(assigned).toBe(11);
    expect(totalLoad(ledger.getAll()) - before).toBe(assigned);
  });

  it('returns the stored result for a repeated ticket without charging again', async () => {
    const { orchestrator, roster: ledger } = createTestEngine({ staff: roster() });
    const ticket = makeTicket({ city: 'Караганда' });

    const first = await orchestrator.process(ticket);
    const second = await orchestrator.process(ticket);

    expect(second).toBe(first);
    expect(ledger.currentLoad('KR-1')).toBe(1);
  });

  it('shares one computation between concurrent calls for the same ticket', async () => {
    const provider = jest.fn<Promise<GeoPoint | null>, [string]>().mockResolvedValue(null);
    const { orchestrator, roster: ledger } = createTestEngine({ staff: roster(), provider });
    const ticket = makeTicket({ city: 'Жанаозен', region: 'Карагандинская' });

    const [a, b, c] = await Promise.all([
      orchestrator.process(ticket),
      orchestrator.process(ticket),
      orchestrator.process(ticket)
    ]);

    expect(a).toBe(b);
    expect(b).toBe(c);
    expect(a.staffId).toBe('KR-1');
    expect(provider).toHaveBeenCalledTimes(2);
    expect(ledger.currentLoad('KR-1')).toBe(1);
  });

  it('escalates to the first hub when the local office lacks a skill', async () => {
    const { orchestrator } = createTestEngine({ staff: roster() });

    const result = await orchestrator.process(makeTicket({ language: 'KZ', city: 'Актау' }));

    expect(result.facility).toBe('Астана');
    expect(result.staffId).toBe('AS-2');
    expect(result.note).toEqual({
      kind: 'SKILL_GAP',
      fromFacility: 'Актау',
      toFacility: 'Астана',
      unmetRequirement: 'KZ_SKILL',
      message: 'No eligible staff at Актау (missing KZ language skill); routed to Астана, 1731 km further'
    });
    expect(result.distanceToAssignedKm).toBe(1731);
  });

  it('escalates data changes to a hub with a chief specialist', async () => {
    const { orchestrator } = createTestEngine({ staff: roster() });

    const result = await orchestrator.process(
      makeTicket({ ticketType: 'DATA_CHANGE', city: 'Караганда' })
    );

    expect(result.staffId).toBe('AS-1');
    expect(result.note?.kind).toBe('SKILL_GAP');
    expect(result.note?.unmetRequirement).toBe('CHIEF_SPECIALIST');
  });

  it('moves on to the second hub and notes the escalation', async () => {
    const { orchestrator } = createTestEngine({ staff: roster() });

    const result = await orchestrator.process(
      makeTicket({ language: 'ENG', region: 'Неизвестная' })
    );

    expect(result).toEqual(
      expect.objectContaining({
        status: 'ASSIGNED',
        facility: 'Алматы',
        staffId: 'AL-1',
        routingBasis: 'HUB_ALTERNATION',
        location: { kind: 'unresolved', reason: 'NO_MATCH' },
        distanceToAssignedKm: null,
        note: {
          kind: 'HUB_ESCALATION',
          fromFacility: 'Астана',
          toFacility: 'Алматы',
          unmetRequirement: 'ENG_SKILL',
          message: 'No eligible staff at Астана (missing ENG language skill); escalated to hub Алматы'
        }
      })
    );
  });

  it('records an unassigned result when no facility can take the ticket', async () => {
    const { orchestrator, roster: ledger } = createTestEngine({
      staff: [makeStaff('AK-3', 'Актау'), makeStaff('KR-1', 'Караганда', { currentLoad: 2 })]
    });

    const result = await orchestrator.process(makeTicket({ segment: 'VIP', city: 'Караганда' }));

    expect(result).toEqual(
      expect.objectContaining({
        status: 'UNASSIGNED',
        reason: 'NO_ELIGIBLE_STAFF',
        facility: 'Алматы',
        staffId: null,
        fingerprint: null,
        note: null
      })
    );
    expect(ledger.currentLoad('KR-1')).toBe(2);
    expect(orchestrator.getResult('T-1')).toBe(result);
  });

  it('never gives a VIP ticket to staff without the VIP skill', async () => {
    const { orchestrator, roster: ledger } = createTestEngine({ staff: roster() });
    const cities = ['Актау', 'Астана', 'Караганда', 'Алматы', undefined];
    const languages = ['RU', 'KZ', 'ENG'] as const;

    let n = 0;
    for (const city of cities) {
      for (const language of languages) {
        const result = await orchestrator.process(
          makeTicket({ ticketId: `VIP-${n++}`, segment: 'VIP', city, language })
        );
        if (result.staffId) {
          expect(ledger.getById(result.staffId)?.skills).toContain('VIP');
        }
      }
    }
  });

  it('records spam without routing it', async () => {
    const provider = jest.fn<Promise<GeoPoint | null>, [string]>().mockResolvedValue(null);
    const { orchestrator, roster: ledger } = createTestEngine({ staff: roster(), provider });
    const before = totalLoad(ledger.getAll());

    const result = await orchestrator.process(
      makeTicket({ ticketType: 'SPAM', region: 'Мангистауская' })
    );

    expect(result).toEqual(
      expect.objectContaining({ status: 'UNASSIGNED', reason: 'SPAM_NOT_ROUTED', facility: null })
    );
    expect(provider).not.toHaveBeenCalled();
    expect(totalLoad(ledger.getAll())).toBe(before);
  });

  it('aborts on an inconsistent roster before touching any state', async () => {
    const { orchestrator, roster: ledger, store } = createTestEngine({
      staff: [...roster(), makeStaff('SH-1', 'Шымкент')]
    });
    const before = totalLoad(ledger.getAll());

    await expect(orchestrator.process(makeTicket({ city: 'Актау' }))).rejects.toThrow(
      InconsistentStateError
    );
    expect(store.size).toBe(0);
    expect(totalLoad(ledger.getAll())).toBe(before);
  });

  it('releases an assignment and gives the load back', async () => {
    const { orchestrator, roster: ledger } = createTestEngine({ staff: roster() });
    const ticket = makeTicket({ city: 'Караганда' });
    await orchestrator.process(ticket);

    const released = await orchestrator.releaseAssignment('T-1');

    expect(released?.staffId).toBe('KR-1');
    expect(ledger.currentLoad('KR-1')).toBe(0);
    expect(orchestrator.getResult('T-1')).toBeUndefined();

    const again = await orchestrator.process(ticket);
    expect(again).not.toBe(released);
    expect(ledger.currentLoad('KR-1')).toBe(1);
  });

  it('hands out a fresh result when a ticket is processed while its release waits for the staff lock', async () => {
    const { orchestrator, roster: ledger, mutex } = createTestEngine({ staff: roster() });
    const ticket = makeTicket({ city: 'Караганда' });
    const first = await orchestrator.process(ticket);

    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const held = mutex.runExclusive([staffLockKey('KR-1')], () => gate);

    const release = orchestrator.releaseAssignment('T-1');
    const again = orchestrator.process(ticket);
    openGate();
    await held;

    await expect(release).resolves.toBe(first);
    const second = await again;
    expect(second).not.toBe(first);
    expect(second.staffId).toBe('KR-1');
    expect(ledger.currentLoad('KR-1')).toBe(1);
    expect(orchestrator.getResult('T-1')).toBe(second);
  });

  it('returns null when releasing an unknown ticket', async () => {
    const { orchestrator } = createTestEngine({ staff: roster() });

    await expect(orchestrator.releaseAssignment('T-404')).resolves.toBeNull();
  });

  it.each([undefined, '', '   '])(
    'sends a ticket with country %p to the hubs even when its city has an office',
    async (country) => {
      const provider = jest.fn<Promise<GeoPoint | null>, [string]>().mockResolvedValue(null);
      const { orchestrator } = createTestEngine({ staff: roster(), provider });

      const result = await orchestrator.process(
        makeTicket({ country, city: 'Актау', region: 'Мангистауская' })
      );

      expect(result).toEqual(
        expect.objectContaining({
          status: 'ASSIGNED',
          facility: 'Астана',
          staffId: 'AS-2',
          routingBasis: 'HUB_ALTERNATION',
          location: { kind: 'unresolved', reason: 'NO_COUNTRY' },
          note: null
        })
      );
      expect(provider).not.toHaveBeenCalled();
    }
  );

  describe('escalation note at the tie-break radius', () => {
    const point = { lat: 43.35, lon: 77.0 };
    const gapKm =
      haversineKm(point, { lat: 43.2, lon: 76.62 }) -
      haversineKm(point, { lat: 43.2183, lon: 76.8932 });

    function processWithRadius(radiusKm: number) {
      const { orchestrator } = createTestEngine({
        env: {
          ROUTING_TIE_BREAK_RADIUS_KM: String(radiusKm),
          ROUTING_FALLBACK_HUBS: 'Каскелен,Астана'
        },
        staff: [
          makeStaff('AL-9', 'Алматы'),
          makeStaff('KS-1', 'Каскелен', { skills: ['KZ'], currentLoad: 5 })
        ]
      });
      return orchestrator.process(makeTicket({ language: 'KZ', region: 'Алматинская' }));
    }

    it('notes a hub escalation when the hub is exactly at the radius', async () => {
      const result = await processWithRadius(gapKm);

      expect(result.staffId).toBe('KS-1');
      expect(result.note).toEqual({
        kind: 'HUB_ESCALATION',
        fromFacility: 'Алматы',
        toFacility: 'Каскелен',
        unmetRequirement: 'KZ_SKILL',
        message: 'No eligible staff at Алматы (missing KZ language skill); escalated to hub Каскелен'
      });
    });

    it('notes a skill gap when the hub is just beyond the radius', async () => {
      const result = await processWithRadius(gapKm - 1e-9);

      expect(result.staffId).toBe('KS-1');
      expect(result.note).toEqual({
        kind: 'SKILL_GAP',
        fromFacility: 'Алматы',
        toFacility: 'Каскелен',
        unmetRequirement: 'KZ_SKILL',
        message: 'No eligible staff at Алматы (missing KZ language skill); routed to Каскелен, 18 km further'
      });
    });
  });

  it('resets hub alternation and round-robin counters', async () => {
    const { orchestrator, allocator } = createTestEngine({ staff: roster() });

    const first = await orchestrator.process(makeTicket({ ticketId: 'T-1', region: 'Неизвестная' }));
    orchestrator.resetAllocatorState();
    const second = await orchestrator.process(makeTicket({ ticketId: 'T-2', region: 'Неизвестная' }));

    expect(first.facility).toBe('Астана');
    expect(second.facility).toBe('Астана');
    expect(allocator.counterFor('Астана|vip=false|data=false|lang=RU|senior=false')).toBe(1);
  });
});

describe('AssignmentOrchestratorService.processBatch', () => {
  it('summarizes a batch and counts repeated tickets as reused', async () => {
    const { orchestrator } = createTestEngine({ staff: roster() });
    const tickets = [
      makeTicket({ ticketId: 'T-1', city: 'Актау' }),
      makeTicket({ ticketId: 'T-2', city: 'Караганда' }),
      makeTicket({ ticketId: 'T-1', city: 'Актау' }),
      makeTicket({ ticketId: 'T-3', ticketType: 'SPAM' })
    ];

    const batch = await orchestrator.processBatch(tickets, { concurrency: 2 });

    expect(batch).toEqual(
      expect.objectContaining({
        totalTickets: 4,
        assigned: 2,
        unassigned: 1,
        reused: 1,
        failed: 0,
        assignedByFacility: { Актау: 1, Караганда: 1 },
        failures: []
      })
    );
    expect(batch.batchId).toMatch(/^BATCH-[a-z0-9]+-[a-z0-9]+$/);
    expect(batch.results.map((r) => r.staffId)).toEqual(['AK-3', 'KR-1', 'AK-3', null]);
    expect(batch.results[2]).toBe(batch.results[0]);
  });

  it('reports inconsistent-state failures per ticket and keeps going', async () => {
    const { orchestrator } = createTestEngine({
      staff: [...roster(), makeStaff('SH-1', 'Шымкент')]
    });

    const batch = await orchestrator.processBatch([
      makeTicket({ ticketId: 'T-1', city: 'Актау' }),
      makeTicket({ ticketId: 'T-2', city: 'Караганда' })
    ]);

    expect(batch.failed).toBe(2);
    expect(batch.results).toEqual([]);
    expect(batch.failures).toEqual([
      {
        ticketId: 'T-1',
        code: 'UNKNOWN_FACILITY',
        reason: 'Staff SH-1 references unknown facility "Шымкент"'
      },
      {
        ticketId: 'T-2',
        code: 'UNKNOWN_FACILITY',
        reason: 'Staff SH-1 references unknown facility "Шымкент"'
      }
    ]);
  });

  it('handles an empty batch', async () => {
    const { orchestrator } = createTestEngine({ staff: roster() });

    const batch = await orchestrator.processBatch([]);

    expect(batch.totalTickets).toBe(0);
    expect(batch.results).toEqual([]);
  });
});

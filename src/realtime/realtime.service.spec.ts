import { RealtimeEvent, RealtimeService } from './realtime.service';

describe('RealtimeService', () => {
  it('should deliver broadcasts to every subscriber', () => {
    const service = new RealtimeService();
    const first: RealtimeEvent[] = [];
    const second: RealtimeEvent[] = [];
    const a = service.getEventStream().subscribe((e) => first.push(e));
    const b = service.getEventStream().subscribe((e) => second.push(e));

    service.broadcast('trade-closed', { tradeId: 'trade-1' });

    expect(first).toHaveLength(1);
    expect(first[0]).toMatchObject({ type: 'trade-closed', data: { tradeId: 'trade-1' } });
    expect(first[0].timestamp).toBeInstanceOf(Date);
    expect(second).toHaveLength(1);
    a.unsubscribe();
    b.unsubscribe();
  });

  it('should not replay events to late subscribers', () => {
    const service = new RealtimeService();
    service.broadcast('daily-report', { netProfit: 1 });

    const received: RealtimeEvent[] = [];
    const subscription = service.getEventStream().subscribe((e) => received.push(e));

    expect(received).toEqual([]);
    subscription.unsubscribe();
  });
});

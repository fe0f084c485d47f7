import { Injectable } from '@nestjs/common';
import { Subject, Observable } from 'rxjs';

export type RealtimeEventType = 'pyramid-recorded' | 'trade-closed' | 'daily-report' | 'settings-update' | 'alert';

export interface RealtimeEvent {
  type: RealtimeEventType;
  data: unknown;
  timestamp: Date;
}

/**
 * Outbound event stream. Subscribers (the SSE endpoint, a notifier) decide
 * how to render and deliver each event.
 */
@Injectable()
export class RealtimeService {
  private eventSubject = new Subject<RealtimeEvent>();

  getEventStream(): Observable<RealtimeEvent> {
    return this.eventSubject.asObservable();
  }

  broadcast(type: RealtimeEventType, data: unknown): void {
    this.eventSubject.next({
      type,
      data,
      timestamp: new Date(),
    });
  }
}

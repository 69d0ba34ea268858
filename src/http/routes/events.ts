// ---------------------------------------------------------------------------
// SSE observer channel: Hono router
// ---------------------------------------------------------------------------

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import type { Services } from '../../services.js';
import type { AppEnv } from '../auth.js';
import { createServiceLogger } from '../../logging/logger.js';

const log = createServiceLogger('http');

export interface EventsRouteOptions {
  /** Interval between keepalive events */
  keepAliveMs: () => number;
}

export function createEventsRoutes(services: Services, options: EventsRouteOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /api/events/stream: push storefront events to this client
  app.get('/stream', (c) =>
    streamSSE(
      c,
      async (stream) => {
        const handle = services.broadcaster.subscribe({
          send: (event) => stream.writeSSE({ event: event.event, data: JSON.stringify(event) }),
          close: () => {
            void stream.close();
          },
        });

        // Remove on disconnect
        stream.onAbort(() => {
          services.broadcaster.unsubscribe(handle);
        });

        await stream.writeSSE({ event: 'ready', data: JSON.stringify({ observer_id: handle.id }) });

        // Keep the stream open until the client disconnects
        while (!stream.aborted && !stream.closed) {
          await stream.sleep(options.keepAliveMs());
          if (stream.aborted || stream.closed) break;
          await stream.writeSSE({ event: 'keepalive', data: '' });
        }

        services.broadcaster.unsubscribe(handle);
      },
      async (err, stream) => {
        log.debug('Event stream closed with error', { error: err.message });
        await stream.close();
      },
    ),
  );

  return app;
}

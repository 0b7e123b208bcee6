import { loadConfig } from './config/loader.js';
import { startHttp } from './connectors/http.js';
import { Router } from './routing/router.js';
import { staticResources } from './static/resources.js';
import { sse } from './web/sse.js';

const config = loadConfig();
const router = new Router();

router.route({
  method: 'POST',
  path: '/echo',
  consumes: ['application/json', 'text/plain', 'application/msgpack'],
  parameters: b => ({ value: b.body.one() }),
  handler: async (_exchange, { value }) => value
});

router.route({
  method: 'GET',
  path: '/hello/{name}',
  produces: ['text/plain'],
  parameters: b => ({ name: b.path('name').one(), greeting: b.query('greeting').one({ default: 'Hello' }) }),
  handler: (_exchange, { name, greeting }) => `${greeting}, ${name}`
});

router.route({
  method: 'GET',
  path: '/clock',
  handler: () =>
    sse((async function* () {
      for (let id = 1; ; id++) {
        yield { id: String(id), event: 'tick', data: { now: new Date().toISOString() } };
        await new Promise(resolve => setTimeout(resolve, 1000));
      }
    })())
});

router.webSocket({
  path: '/ws/echo',
  subprotocols: ['json', 'msgpack'],
  handler: async function* (exchange) {
    for await (const message of exchange.inbound.messages()) {
      yield message.binary ? await message.reduceToBytes() : await message.reduceToString();
    }
  }
});

if (config.static.root) {
  staticResources(router, { prefix: config.static.prefix, root: config.static.root });
  console.log(`[HTTP] Serving ${config.static.root} under ${config.static.prefix}`);
}

const server = startHttp(router, config);
server.on('listening', () => {
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.port;
  console.log(`junction HTTP/WS on ${config.bind}:${port}`);
});

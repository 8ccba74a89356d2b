import { readFileSync } from 'node:fs';
import type { AddressInfo } from 'node:net';
import tls from 'node:tls';
import { fileURLToPath } from 'node:url';

export const certPath = fileURLToPath(new URL('../fixtures/localhost-cert.pem', import.meta.url));
const keyPath = fileURLToPath(new URL('../fixtures/localhost-key.pem', import.meta.url));

/** TLS endpoint that answers every complete request with `status` and records the request body. */
export async function startEndpoint(status = 202) {
  const bodies: string[] = [];
  const server = tls.createServer({ key: readFileSync(keyPath), cert: readFileSync(certPath) }, socket => {
    let raw = '';
    socket.setEncoding('utf8');
    socket.on('error', () => undefined);
    socket.on('data', chunk => {
      raw += chunk;
      const headEnd = raw.indexOf('\r\n\r\n');
      const length = /content-length: (\d+)/i.exec(raw);
      if (headEnd === -1 || !length || raw.length - headEnd - 4 < Number(length[1])) {
        return;
      }
      bodies.push(raw.slice(headEnd + 4));
      socket.end(`HTTP/1.1 ${status} Status\r\nContent-Length: 0\r\n\r\n`);
    });
  });
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Endpoint is not listening on a TCP port');
  }
  const { port }: AddressInfo = address;
  return {
    url: `https://localhost:${port}`,
    bodies,
    close: () => new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve()))),
  };
}

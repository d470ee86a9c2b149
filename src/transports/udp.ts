import dgram from 'dgram';
import { AbortError, ConnectionError, TimeoutError } from '../errors.js';
import type { DnsTransport, DnsTransportRequest } from '../types.js';
import { isValidIpv6 } from '../utils.js';

// send one query datagram and resolve with the first reply datagram
export const udpTransport: DnsTransport = async function (
  request: DnsTransportRequest
): Promise<Buffer> {
  const { server, port, payload, timeout, signal } = request;

  // check if external signal is already aborted
  if (signal?.aborted) {
    throw new AbortError('Query was aborted');
  }

  // create a UDP socket - use udp6 for IPv6 addresses, udp4 for IPv4
  const socketType = isValidIpv6(server) ? 'udp6' : 'udp4';
  const socket = dgram.createSocket(socketType);

  // wait for the response packet
  return await new Promise<Buffer>((resolve, reject) => {
    let isSettled = false;
    let isClosed = false;

    // release everything this query holds, exactly once
    const cleanup = () => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      socket.removeAllListeners();
      if (!isClosed) {
        isClosed = true;
        socket.close();
      }
    };

    // helper to safely resolve once
    const safeResolve = (response: Buffer) => {
      if (!isSettled) {
        isSettled = true;
        cleanup();
        resolve(response);
      }
    };

    // helper to safely reject once
    const safeReject = (error: Error) => {
      if (!isSettled) {
        isSettled = true;
        cleanup();
        reject(error);
      }
    };

    // internal timeout
    const timeoutId = setTimeout(() => {
      safeReject(
        new TimeoutError(`Timeout waiting for a reply from '${server}:${port}' after ${timeout}ms`)
      );
    }, timeout);

    // external cancellation
    const onAbort = () => safeReject(new AbortError('Query was aborted'));
    signal?.addEventListener('abort', onAbort);

    // the first datagram is the reply, decoding is up to the caller
    socket.on('message', (message: Buffer) => {
      safeResolve(message);
    });

    // handle errors, close socket, and reject the promise
    socket.on('error', (error: Error) => {
      safeReject(new ConnectionError(error.message));
    });

    // handle socket close events
    socket.on('close', () => {
      isClosed = true;
      safeReject(new ConnectionError('UDP socket closed unexpectedly'));
    });

    // send the query packet to the DNS server AFTER event listeners are attached
    socket.send(payload, 0, payload.length, port, server, err => {
      if (err) {
        safeReject(new ConnectionError(`Failed to send UDP query: ${err.message}`));
      }
    });
  });
};

/**
 * Connection
 *
 * What the lobby and match server need from a transport. Incoming text is
 * pushed to them by whoever owns the socket; tests use plain objects with
 * vi.fn() members.
 */

import WebSocket from 'ws';

export interface Connection {
    readonly id: string;
    send(text: string): void;
    close(reason?: string): void;
}

/** Normal closure */
const CLOSE_NORMAL = 1000;
/** Policy violation: malformed or unexpected packet */
const CLOSE_POLICY = 1008;

export interface SocketConnection extends Connection {
    readonly socket: WebSocket;
}

/**
 * Adapt a ws socket. Sends on a socket that is no longer open are dropped;
 * the close event reports the disconnect.
 */
export function wrapSocket(socket: WebSocket, id: string): SocketConnection {
    return {
        id,
        socket,
        send(text: string): void {
            if (socket.readyState === WebSocket.OPEN) {
                socket.send(text);
            }
        },
        close(reason?: string): void {
            if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
                // Close reasons are capped at 123 bytes
                socket.close(reason ? CLOSE_POLICY : CLOSE_NORMAL, reason?.slice(0, 120));
            }
        }
    };
}

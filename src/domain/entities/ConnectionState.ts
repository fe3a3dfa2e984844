/**
 * Session 的連線狀態
 *
 * unconnected ──connect()──▶ connected ──close() / exit()──▶ closed
 *                                ▲                              │
 *                                └──────────connect()───────────┘
 */
export type ConnectionState = 'unconnected' | 'connected' | 'closed';

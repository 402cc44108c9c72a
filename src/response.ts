import type { Response } from 'express';
import type { User } from './data/users';

export interface HealthInfo {
  timestamp: string;
  uptime: string;
}

export type Payload =
  | { kind: 'none' }
  | { kind: 'user'; user: User }
  | { kind: 'users'; users: User[] }
  | { kind: 'health'; health: HealthInfo };

export interface Envelope {
  status: 'success' | 'error';
  message: string;
  data?: User | User[] | HealthInfo;
}

function payloadData(payload: Payload): Envelope['data'] {
  switch (payload.kind) {
    case 'none':
      return undefined;
    case 'user':
      return payload.user;
    case 'users':
      return payload.users;
    case 'health':
      return payload.health;
  }
}

export function sendSuccess(res: Response, statusCode: number, message: string, payload: Payload): void {
  const envelope: Envelope = { status: 'success', message };
  const data = payloadData(payload);
  if (data !== undefined) {
    envelope.data = data;
  }
  res.status(statusCode).json(envelope);
}

export function sendError(res: Response, statusCode: number, message: string): void {
  const envelope: Envelope = { status: 'error', message };
  res.status(statusCode).json(envelope);
}

import type { ServerRoleState, ServerStatusDescription, ServerStatusKey } from './types';

export const STATUS_RESPONSES: Readonly<
  Record<ServerStatusKey, { message: string; statusCode: number }>
> = {
  fully_loaded: {
    message: 'Server Machine is live!\nMinecraft Server is RUNNING',
    statusCode: 200,
  },
  starting: {
    message: 'Server Machine is live!\nMinecraft Server is STARTING',
    statusCode: 205,
  },
  off: {
    message: 'Server Machine is live!\nMinecraft Server is OFFLINE',
    statusCode: 206,
  },
  restarting: {
    message: 'Server Machine is live!\nMinecraft Server is RESTARTING',
    statusCode: 207,
  },
  stopping: {
    message: 'Server Machine is live!\nMinecraft Server is STOPPING',
    statusCode: 208,
  },
  error: {
    message: 'Server Machine is OFFLINE',
    statusCode: 500,
  },
};

export function getStatusKey(state: ServerRoleState, restarting: boolean): ServerStatusKey {
  if (restarting) {
    return 'restarting';
  }

  switch (state) {
    case 'Running':
      return 'fully_loaded';
    case 'Starting':
      return 'starting';
    case 'Stopping':
      return 'stopping';
    case 'Failed':
      return 'error';
    case 'Stopped':
    case 'Inactive':
      return 'off';
  }
}

export function describeStatus(key: ServerStatusKey): ServerStatusDescription {
  return { key, ...STATUS_RESPONSES[key] };
}

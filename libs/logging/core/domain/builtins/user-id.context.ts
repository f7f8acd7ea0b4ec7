import { ContextRequest } from '../context-request';
import { LogContext } from '../log-context';

export const USER_ID_ATTRIBUTE = 'user_id';

/**
 * User ID set on the request by an upstream authentication step.
 * Never generated: requests without one are logged as the default user.
 */
export class UserIdContext extends LogContext {
  constructor(defaultValue: string = 'anonymous') {
    super('user_id', defaultValue);
  }

  extractFromRequest(request: ContextRequest): string {
    const userId = request.state[USER_ID_ATTRIBUTE];
    if (typeof userId === 'string' && userId.length > 0) return userId;
    if (typeof userId === 'number') return String(userId);
    return this.defaultValue;
  }
}

/**
 * The account a flow acts on.
 */
export interface FlowUser {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly isActive: boolean;
  /** Preferred locale, e.g. "de-DE" */
  readonly locale?: string;
}

export type UserLookupField = 'username' | 'email';

/**
 * Account storage supplied by the host.
 */
export interface UserStore {
  get(id: string): Promise<FlowUser | null>;

  /** Find a user whose `fields` match `uid` (case-insensitive for email) */
  findByIdentifier(uid: string, fields: UserLookupField[]): Promise<FlowUser | null>;

  setActive(id: string, active: boolean): Promise<void>;
}

/**
 * Who a job belongs to. Users and channels share the platform's integer id
 * space but never each other's counters or queues.
 */
export type Owner = UserOwner | ChannelPostOwner;

export interface UserOwner {
  kind: 'user';
  userId: number;
}

/** A video posted in a channel; resolved by editing the original post. */
export interface ChannelPostOwner {
  kind: 'channel-post';
  channelId: number;
  messageId: number;
}

export function userOwner(userId: number): UserOwner {
  return { kind: 'user', userId };
}

export function channelPostOwner(channelId: number, messageId: number): ChannelPostOwner {
  return { kind: 'channel-post', channelId, messageId };
}

/**
 * Id of the slot holder: the user, or the channel a post belongs to.
 */
export function slotId(owner: Owner): number {
  return owner.kind === 'user' ? owner.userId : owner.channelId;
}

/** Key shared by every post of the same channel. */
export function ownerKey(owner: Owner): string {
  return owner.kind === 'user' ? `user:${owner.userId}` : `channel:${owner.channelId}`;
}

export function channelPostKey(owner: ChannelPostOwner): string {
  return `${owner.channelId}/${owner.messageId}`;
}

export function describeOwner(owner: Owner): string {
  return owner.kind === 'user'
    ? `user ${owner.userId}`
    : `channel ${owner.channelId} post ${owner.messageId}`;
}

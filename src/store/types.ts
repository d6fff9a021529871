/**
 * Database row shape for the feeds table.
 */
export interface Feed {
  id: number;
  name: string | null;
  url: string;
}

/**
 * Database row shape for the feed_entries table.
 */
export interface FeedEntry {
  id: number;
  feed_id: number;
  title: string;
  published_at: string;
  url: string;
}

export interface User {
  id: number;
  username: string;
}

export interface Subscription {
  user_id: number;
  feed_id: number;
}

export interface View {
  user_id: number;
  feed_entry_id: number;
}

/**
 * An unread entry as served to a client, with its feed's url joined in.
 */
export interface UnviewedEntry extends FeedEntry {
  feed_url: string;
}

export type RecordResult = { status: 'inserted'; id: number } | { status: 'duplicate' };

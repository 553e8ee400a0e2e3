// Shared types for the social pipeline agent

// Publishing channels
export type Channel = 'facebook' | 'instagram' | 'linkedin';

export const CHANNELS: readonly Channel[] = ['facebook', 'instagram', 'linkedin'];

export const isChannel = (value: string): value is Channel =>
  (CHANNELS as readonly string[]).includes(value);

// Client (aggregate root)
export type ClientStatus = 'active' | 'inactive';
export type ApprovalMode = 'manual' | 'auto';

export interface ClientPageIds {
  facebook?: string;
  instagram?: string;
  linkedin?: string;
}

export interface Client {
  id: string;
  name: string;
  handle: string;
  status: ClientStatus;
  channels: Channel[];
  cadencePerWeek: number;
  brandVoice: string;
  instructions: string;
  approvalMode: ApprovalMode;
  pageIds: ClientPageIds;
  createdAt: string;
  updatedAt: string;
}

// Idea
export type IdeaOrigin = 'curated' | 'client-submitted';
export type IdeaState = 'new' | 'drafted' | 'discarded';

export interface Idea {
  id: string;
  clientId: string;
  headline: string;
  summary: string;
  imageUrl?: string;
  origin: IdeaOrigin;
  state: IdeaState;
  channel?: Channel;
  sourceDetail?: string;
  createdAt: string;
  updatedAt: string;
}

// Post
export type PostStatus = 'pending' | 'approved' | 'rejected' | 'published' | 'failed';

export const TERMINAL_POST_STATUSES: readonly PostStatus[] = ['published', 'rejected', 'failed'];

export interface Post {
  id: string;
  clientId: string;
  ideaId: string;
  body: string;
  channel: Channel;
  mediaUrl?: string;
  status: PostStatus;
  feedback?: string;
  error?: string;
  platformPostId?: string;
  attempts: number;
  createdAt: string;
  updatedAt: string;
  publishedAt?: string;
}

// Conversation session
export type SessionState = 'idle' | 'awaiting_selection' | 'awaiting_confirmation';

export type Category = 'social_media' | 'digital_presence' | 'lead_generation' | 'email_campaigns';

// Reference to an item shown to the user in a numbered list
export type ItemRef =
  | { kind: 'post'; id: string }
  | { kind: 'category'; id: Category };

export interface SelectedPostIntent {
  type: 'select_post';
  postId: string;
}

export interface Session {
  clientId: string;
  state: SessionState;
  lastShownList: ItemRef[];
  lastIntent: SelectedPostIntent | null;
  createdAt: string;
  lastActivityAt: string;
  expiresAt: string;
}

// Pipeline stages and runs
export type StageName = 'curate' | 'draft' | 'approve_check' | 'publish';

export type StageStatus = 'success' | 'partial' | 'empty' | 'skipped' | 'failed';

export interface StageOutcome {
  stage: StageName;
  status: StageStatus;
  requested?: number;
  affected: number;
  itemIds: string[];
  diagnostic?: string;
  errorCategory?: string;
  startedAt: string;
  finishedAt: string;
}

export type RunStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled';
export type RunMode = 'sync' | 'async';

export interface StageRequest {
  stages: StageName[];
  numIdeas?: number;
  numPosts?: number;
  ideaIds?: string[];
  postIds?: string[];
  bestEffort?: StageName[];
}

export interface PipelineRun {
  id: string;
  clientId: string;
  batchId?: string;
  stages: StageName[];
  currentStage: StageName | null;
  outcomes: StageOutcome[];
  status: RunStatus;
  mode: RunMode;
  params: StageRequest;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
}

export interface BatchReport {
  id: string;
  request: StageRequest;
  createdAt: string;
  clients: Record<string, { runId: string; status: RunStatus; outcomes: StageOutcome[] }>;
  skipped: Array<{ clientId: string; reason: string }>;
}

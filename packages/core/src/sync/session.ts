/**
 * Sync Session
 *
 * Wires a transport and signer to the entity stores, presence reducers and
 * subscription orchestrator. Incoming records are routed by kind; outgoing
 * intents are built, signed, applied optimistically and published, with
 * the optimistic state rolled back when publishing fails.
 *
 * Usage:
 *   const session = createSyncSession({ transport, signer });
 *   const watch = session.watchProjects();
 *   session.stores.projects.onChange((change) => render(change));
 *   await session.publishConversation({ projectIdentity, content: "Hi" });
 *   session.shutdown();
 */

import type { RecordDraft, SyncRecord } from "../records/record.js";
import { RecordKind } from "../records/kinds.js";
import {
  agentProfilePolicy,
  parseAgentProfile,
  type AgentProfile,
} from "../entities/agent.js";
import {
  conversationPolicy,
  parseConversation,
  type Conversation,
} from "../entities/conversation.js";
import { lessonPolicy, parseLesson, type Lesson } from "../entities/lesson.js";
import { parseProject, projectPolicy, type Project } from "../entities/project.js";
import { compareReplies, parseReply, replyPolicy, type Reply } from "../entities/reply.js";
import {
  llmConfigPolicy,
  parseLLMConfigChange,
  type LLMConfigChange,
} from "../entities/status.js";
import { parseTask, taskPolicy, type Task } from "../entities/task.js";
import { EntityStore } from "../store/entity-store.js";
import {
  PhaseTracker,
  ProjectStatusReducer,
  TaskAbortInbox,
  TypingReducer,
} from "../presence/index.js";
import {
  SubscriptionOrchestrator,
  type ChildWatchGroup,
  type WatchHandle,
} from "../subscriptions/orchestrator.js";
import {
  TransportNotConfiguredError,
  UnknownEntityError,
  toTransportError,
  type SyncError,
} from "../transport/errors.js";
import type { CachePolicy, RecordFilter, Signer, Transport } from "../transport/types.js";
import {
  buildAgentProfile,
  buildConversation,
  buildConversationReply,
  buildLLMConfigChange,
  buildLesson,
  buildLessonComment,
  buildProject,
  buildProjectStatus,
  buildProjectUpdate,
  buildTask,
  buildTaskAbort,
  buildTaskUpdate,
  buildTypingSignal,
  buildTypingStop,
  type AgentProfileIntent,
  type ConversationIntent,
  type ConversationReplyIntent,
  type LLMConfigChangeIntent,
  type LessonCommentIntent,
  type LessonIntent,
  type ProjectChanges,
  type ProjectIntent,
  type ProjectStatusIntent,
  type TaskIntent,
  type TaskUpdateIntent,
  type TypingSignalIntent,
  type TypingStopIntent,
} from "../builders/index.js";

// --- Types ---

export interface SessionSettings {
  collectTimeoutMs: number;
  replayBufferSize: number;
  statusFreshnessSeconds: number;
  defaultCachePolicy: CachePolicy;
  debug: boolean;
}

export interface PublishEvent {
  kind: number;
  success: boolean;
  /** Destinations that acknowledged the record */
  destinations: number;
  errorCode?: string;
}

export interface SyncSessionHooks {
  onPublish?: (event: PublishEvent) => void;
  onSubscriptionError?: (signature: string, error: SyncError) => void;
}

export interface SyncSessionOptions {
  transport: Transport | null;
  signer: Signer | null;
  settings?: Partial<SessionSettings>;
  hooks?: SyncSessionHooks;
}

export interface SyncStores {
  projects: EntityStore<Project>;
  conversations: EntityStore<Conversation>;
  tasks: EntityStore<Task>;
  agents: EntityStore<AgentProfile>;
  lessons: EntityStore<Lesson>;
  replies: EntityStore<Reply>;
  llmConfigs: EntityStore<LLMConfigChange>;
}

/** Projects plus one status monitor per project */
export interface ProjectWatch {
  projects: WatchHandle;
  statuses: ChildWatchGroup;
  cancel: () => void;
}

export interface SyncSession {
  readonly creator: string | null;
  readonly stores: SyncStores;
  readonly statuses: ProjectStatusReducer;
  readonly typing: TypingReducer;
  readonly aborts: TaskAbortInbox;
  readonly phases: PhaseTracker;
  readonly orchestrator: SubscriptionOrchestrator;

  /** Route one record to its store or reducer. Returns true when state changed. */
  ingest: (record: SyncRecord) => boolean;
  /** One-shot fetch through the transport; returns how many records changed state. */
  refresh: (filter: RecordFilter) => Promise<number>;

  watchProjects: (options?: { authors?: string[] }) => ProjectWatch;
  watchConversations: (projectIdentity: string) => WatchHandle;
  watchTasks: (projectIdentity: string) => WatchHandle;
  watchAgents: (options?: { authors?: string[] }) => WatchHandle;
  watchLessons: (projectIdentity: string) => WatchHandle;
  watchReplies: (rootId: string) => WatchHandle;
  watchTyping: (conversationId: string) => WatchHandle;
  /** One typing watch per conversation in the store */
  watchConversationTyping: () => ChildWatchGroup;
  watchTaskAborts: (taskIds: string[]) => WatchHandle;

  projectConversations: (projectIdentity: string) => Conversation[];
  projectTasks: (projectIdentity: string) => Task[];
  threadReplies: (rootId: string) => Reply[];

  publishProject: (intent: ProjectIntent) => Promise<Project>;
  publishProjectUpdate: (identity: string, changes: ProjectChanges) => Promise<Project>;
  publishConversation: (intent: ConversationIntent) => Promise<Conversation>;
  publishReply: (intent: ConversationReplyIntent) => Promise<Reply>;
  publishTask: (intent: TaskIntent) => Promise<Task>;
  publishTaskUpdate: (intent: TaskUpdateIntent) => Promise<Task>;
  publishAgentProfile: (intent: AgentProfileIntent) => Promise<AgentProfile>;
  publishLesson: (intent: LessonIntent) => Promise<Lesson>;
  publishLessonComment: (intent: LessonCommentIntent) => Promise<Reply>;
  publishProjectStatus: (intent: ProjectStatusIntent) => Promise<SyncRecord>;
  publishLLMConfigChange: (intent: LLMConfigChangeIntent) => Promise<SyncRecord>;
  publishTypingSignal: (intent: TypingSignalIntent) => Promise<SyncRecord>;
  publishTypingStop: (intent: TypingStopIntent) => Promise<SyncRecord>;
  publishTaskAbort: (taskId: string) => Promise<SyncRecord>;

  shutdown: () => void;
}

const DEFAULT_SETTINGS: SessionSettings = {
  collectTimeoutMs: 5000,
  replayBufferSize: 500,
  statusFreshnessSeconds: 120,
  defaultCachePolicy: "cacheThenNetwork",
  debug: false,
};

// --- Routing ---

interface Applied<E> {
  entity: E;
  changed: boolean;
  rollback: () => void;
}

/**
 * Parse a record into its store. The returned rollback restores the
 * previous entry, unless something newer has replaced the result since.
 */
function applyTo<E>(
  store: EntityStore<E>,
  entity: E,
  identity: string
): Applied<E> {
  const previous = store.get(identity);
  const result = store.upsert(identity, entity);

  return {
    entity: result.entity,
    changed: result.changed,
    rollback: () => {
      if (result.changed && store.get(identity) === result.entity) {
        store.restore(identity, previous);
      }
    },
  };
}

// --- Singleton ---

let _session: SyncSession | null = null;

export function initSyncSession(options: SyncSessionOptions): SyncSession {
  if (_session) {
    _session.shutdown();
  }
  _session = createSyncSession(options);
  return _session;
}

export function getSyncSession(): SyncSession | null {
  return _session;
}

// --- Implementation ---

export function createSyncSession(options: SyncSessionOptions): SyncSession {
  const { transport, signer, hooks = {} } = options;
  const settings: SessionSettings = { ...DEFAULT_SETTINGS, ...options.settings };

  const stores: SyncStores = {
    projects: new EntityStore(projectPolicy, "ProjectStore"),
    conversations: new EntityStore(conversationPolicy, "ConversationStore"),
    tasks: new EntityStore(taskPolicy, "TaskStore"),
    agents: new EntityStore(agentProfilePolicy, "AgentStore"),
    lessons: new EntityStore(lessonPolicy, "LessonStore"),
    replies: new EntityStore(replyPolicy, "ReplyStore"),
    llmConfigs: new EntityStore(llmConfigPolicy, "LLMConfigStore"),
  };

  const statuses = new ProjectStatusReducer({
    freshnessSeconds: settings.statusFreshnessSeconds,
  });
  const typing = new TypingReducer();
  const aborts = new TaskAbortInbox();
  const phases = new PhaseTracker();

  const orchestrator = new SubscriptionOrchestrator({
    transport,
    defaultCachePolicy: settings.defaultCachePolicy,
    replayBufferSize: settings.replayBufferSize,
    debug: settings.debug,
    onSubscriptionError: (signature, error) => {
      try {
        hooks.onSubscriptionError?.(signature, error);
      } catch (err) {
        console.error("[SyncSession] onSubscriptionError hook failed:", err);
      }
    },
  });

  // --- Entity routes ---

  function applyProject(record: SyncRecord): Applied<Project> | null {
    const project = parseProject(record);
    if (project.slug === "") {
      console.warn(`[SyncSession] Ignoring project ${record.id} without slug`);
      return null;
    }
    return applyTo(stores.projects, project, project.identity);
  }

  function applyConversation(record: SyncRecord): Applied<Conversation> {
    const conversation = parseConversation(record);
    return applyTo(stores.conversations, conversation, conversation.id);
  }

  function applyTask(record: SyncRecord): Applied<Task> {
    const task = parseTask(record);
    return applyTo(stores.tasks, task, task.id);
  }

  function applyAgent(record: SyncRecord): Applied<AgentProfile> {
    const agent = parseAgentProfile(record);
    return applyTo(stores.agents, agent, agent.identity);
  }

  function applyLesson(record: SyncRecord): Applied<Lesson> {
    const lesson = parseLesson(record);
    return applyTo(stores.lessons, lesson, lesson.id);
  }

  function applyReply(record: SyncRecord): Applied<Reply> {
    const reply = parseReply(record);
    return applyTo(stores.replies, reply, reply.id);
  }

  function applyLLMConfig(record: SyncRecord): boolean {
    const change = parseLLMConfigChange(record);
    if (change.projectIdentity === "") return false;
    return stores.llmConfigs.upsert(change.projectIdentity, change).changed;
  }

  function ingest(record: SyncRecord): boolean {
    switch (record.kind) {
      case RecordKind.project:
        return applyProject(record)?.changed ?? false;
      case RecordKind.chat:
        return applyConversation(record).changed;
      case RecordKind.task:
        return applyTask(record).changed;
      case RecordKind.agentConfig:
        return applyAgent(record).changed;
      case RecordKind.agentLesson:
        return applyLesson(record).changed;
      case RecordKind.threadReply: {
        const phaseChanged = phases.reduce(record);
        return applyReply(record).changed || phaseChanged;
      }
      case RecordKind.projectStatus:
        return statuses.reduce(record)?.changed ?? false;
      case RecordKind.llmConfigChange:
        return applyLLMConfig(record);
      case RecordKind.typingIndicator:
      case RecordKind.typingIndicatorStop:
        return typing.reduce(record);
      case RecordKind.taskAbort:
        return aborts.reduce(record);
      default:
        if (settings.debug) {
          console.warn(`[SyncSession] No route for kind ${record.kind}`);
        }
        return false;
    }
  }

  async function refresh(filter: RecordFilter): Promise<number> {
    const records = await orchestrator.collectOnce(filter, {
      timeoutMs: settings.collectTimeoutMs,
    });

    let changed = 0;
    for (const record of [...records].sort((a, b) => a.createdAt - b.createdAt)) {
      if (ingest(record)) changed += 1;
    }
    return changed;
  }

  // --- Watches ---

  function watchProjects(watchOptions: { authors?: string[] } = {}): ProjectWatch {
    const projects = orchestrator.watch(
      { kinds: [RecordKind.project], authors: watchOptions.authors },
      ingest
    );

    let statusGroup: ChildWatchGroup;
    try {
      statusGroup = orchestrator.watchEach({
        parents: stores.projects,
        childFilter: (project) => ({
          kinds: [RecordKind.projectStatus, RecordKind.llmConfigChange],
          tags: { a: [project.identity] },
        }),
        onChildRecord: (_project, record) => ingest(record),
        cachePolicy: "networkOnly",
      });
    } catch (err) {
      projects.cancel();
      throw err;
    }

    return {
      projects,
      statuses: statusGroup,
      cancel: () => {
        statusGroup.cancel();
        projects.cancel();
      },
    };
  }

  function typingFilter(conversationId: string): RecordFilter {
    return {
      kinds: [RecordKind.typingIndicator, RecordKind.typingIndicatorStop],
      tags: { e: [conversationId] },
    };
  }

  function watchProjectKind(kind: number, projectIdentity: string): WatchHandle {
    return orchestrator.watch({ kinds: [kind], tags: { a: [projectIdentity] } }, ingest);
  }

  // --- Publishing ---

  function requireSigner(): { transport: Transport; signer: Signer } {
    if (!transport || !signer) {
      throw new TransportNotConfiguredError("Cannot publish: no transport or signer configured");
    }
    return { transport, signer };
  }

  function reportPublish(event: PublishEvent): void {
    try {
      hooks.onPublish?.(event);
    } catch (err) {
      console.error("[SyncSession] onPublish hook failed:", err);
    }
  }

  /**
   * Sign and publish a draft. `apply` puts the record into local state first;
   * its rollback runs when the transport fails.
   */
  async function publishDraft<E>(
    draft: RecordDraft,
    apply: (record: SyncRecord) => Applied<E> | null
  ): Promise<{ record: SyncRecord; entity: E | null }> {
    const bound = requireSigner();
    const record = await bound.signer.sign(draft);
    const applied = apply(record);

    try {
      const destinations = await bound.transport.publish(record);
      reportPublish({ kind: record.kind, success: true, destinations: destinations.size });
      return { record, entity: applied ? applied.entity : null };
    } catch (err) {
      applied?.rollback();
      const error = toTransportError(err, "publish");
      console.error(`[SyncSession] Publish of kind ${record.kind} failed:`, error.message);
      reportPublish({ kind: record.kind, success: false, destinations: 0, errorCode: error.code });
      throw error;
    }
  }

  async function publishEntity<E>(
    draft: RecordDraft,
    apply: (record: SyncRecord) => Applied<E> | null
  ): Promise<E> {
    const { record, entity } = await publishDraft(draft, apply);
    if (entity === null) {
      throw new UnknownEntityError(record.id);
    }
    return entity;
  }

  async function publishSignal(draft: RecordDraft): Promise<SyncRecord> {
    const { record } = await publishDraft(draft, () => null);
    return record;
  }

  async function publishProjectUpdate(identity: string, changes: ProjectChanges): Promise<Project> {
    const project = stores.projects.get(identity);
    if (!project) {
      throw new UnknownEntityError(identity);
    }
    return publishEntity(buildProjectUpdate(project, changes), applyProject);
  }

  async function publishTaskUpdate(intent: TaskUpdateIntent): Promise<Task> {
    const task = stores.tasks.get(intent.taskId);
    if (!task) {
      throw new UnknownEntityError(intent.taskId);
    }
    const draft = buildTaskUpdate({
      ...intent,
      projectIdentity: intent.projectIdentity ?? (task.projectIdentity || undefined),
    });
    // Updates must land after the version they refresh
    return publishEntity(
      { ...draft, createdAt: Math.max(draft.createdAt, task.updatedAt + 1) },
      applyTask
    );
  }

  return {
    creator: signer ? signer.creator : null,
    stores,
    statuses,
    typing,
    aborts,
    phases,
    orchestrator,

    ingest,
    refresh,

    watchProjects,
    watchConversations: (projectIdentity) => watchProjectKind(RecordKind.chat, projectIdentity),
    watchTasks: (projectIdentity) => watchProjectKind(RecordKind.task, projectIdentity),
    watchAgents: (watchOptions = {}) =>
      orchestrator.watch(
        { kinds: [RecordKind.agentConfig], authors: watchOptions.authors },
        ingest
      ),
    watchLessons: (projectIdentity) => watchProjectKind(RecordKind.agentLesson, projectIdentity),
    watchReplies: (rootId) =>
      orchestrator.watch({ kinds: [RecordKind.threadReply], tags: { E: [rootId] } }, ingest),
    watchTyping: (conversationId) =>
      orchestrator.watch(typingFilter(conversationId), ingest, { cachePolicy: "networkOnly" }),
    watchConversationTyping: () =>
      orchestrator.watchEach({
        parents: stores.conversations,
        childFilter: (conversation) => typingFilter(conversation.id),
        onChildRecord: (_conversation, record) => ingest(record),
        cachePolicy: "networkOnly",
      }),
    watchTaskAborts: (taskIds) =>
      orchestrator.watch(
        { kinds: [RecordKind.taskAbort], tags: { e: taskIds } },
        ingest,
        { cachePolicy: "networkOnly" }
      ),

    projectConversations: (projectIdentity) =>
      stores.conversations
        .values()
        .filter((c) => c.projectIdentity === projectIdentity)
        .sort((a, b) => b.createdAt - a.createdAt),
    projectTasks: (projectIdentity) =>
      stores.tasks
        .values()
        .filter((t) => t.projectIdentity === projectIdentity)
        .sort((a, b) => b.createdAt - a.createdAt),
    threadReplies: (rootId) =>
      stores.replies
        .values()
        .filter((r) => r.rootId === rootId)
        .sort(compareReplies),

    publishProject: async (intent) => publishEntity(buildProject(intent), applyProject),
    publishProjectUpdate,
    publishConversation: async (intent) =>
      publishEntity(buildConversation(intent), applyConversation),
    publishReply: async (intent) => publishEntity(buildConversationReply(intent), applyReply),
    publishTask: async (intent) => publishEntity(buildTask(intent), applyTask),
    publishTaskUpdate,
    publishAgentProfile: async (intent) => publishEntity(buildAgentProfile(intent), applyAgent),
    publishLesson: async (intent) => publishEntity(buildLesson(intent), applyLesson),
    publishLessonComment: async (intent) =>
      publishEntity(buildLessonComment(intent), applyReply),
    publishProjectStatus: async (intent) => publishSignal(buildProjectStatus(intent)),
    publishLLMConfigChange: async (intent) => publishSignal(buildLLMConfigChange(intent)),
    publishTypingSignal: async (intent) => publishSignal(buildTypingSignal(intent)),
    publishTypingStop: async (intent) => publishSignal(buildTypingStop(intent)),
    publishTaskAbort: async (taskId) => publishSignal(buildTaskAbort({ taskId })),

    shutdown: () => orchestrator.cancelAll(),
  };
}

// src/services/tenderService.ts
import { promises as fs } from "fs";
import type { Dayjs } from "dayjs";
import { formatDay, toDay } from "../lib/dates";
import type {
  Draft,
  Notice,
  SessionSettings,
  Tender,
  TenderStatus,
} from "../types/tender";
import {
  calendarPoints,
  draftLibrary,
  kanbanLanes,
  type CalendarPoint,
  type KanbanLane,
  type LibraryEntry,
} from "./boardService";
import type { DocumentWriter } from "./documentService";
import {
  appendDraft,
  createDraft,
  findDraft,
  nextDraftStatus,
  removeDraft,
  replaceDraft,
  updateDraft,
  type DraftPatch,
  type NewDraftInput,
} from "./draftService";
import { filterTenders, type TenderFilters } from "./filterService";
import type { Mailer } from "./mailer";
import {
  computeDashboard,
  deadlineNotices,
  type DashboardMetrics,
  type FileTimeLookup,
} from "./metricsService";
import { normalizeAssignee, nextTenderId, parseScore } from "./tenderRows";
import type { TenderSource } from "./tenderSource";
import { mergeFeed } from "./tenderSource";
import type { TenderStore } from "./tenderStore";

export type FailureReason = "not_found" | "failed" | "unavailable";

export interface Failure {
  ok: false;
  reason: FailureReason;
  error: Notice;
}

export type Outcome<T> = { ok: true; data: T; notices: Notice[] } | Failure;

export interface NewTenderInput {
  title: string;
  org?: string;
  sector?: string;
  deadline?: string;
  description?: string;
  status?: TenderStatus;
  score?: number;
  assignee?: string;
}

export type TenderPatch = Partial<Omit<NewTenderInput, "title">> & { title?: string };

export interface SampleTender {
  title: string;
  org: string;
  sector: string;
  deadlineInDays: number;
  description: string;
  status: TenderStatus;
  assignee: string;
}

export interface DashboardView {
  metrics: DashboardMetrics;
  notices: Notice[];
  lanes: KanbanLane[];
  calendar: CalendarPoint[];
}

/** Explicit per-session settings, replaced through the settings API. */
export interface Session {
  settings: SessionSettings;
}

export interface TenderServiceDeps {
  store: TenderStore;
  documents: DocumentWriter;
  mailer: Mailer;
  source: TenderSource;
  session: Session;
  template: string;
  clock?: () => Date;
  fileTime?: FileTimeLookup;
}

export interface TenderService {
  list(filters: TenderFilters): Promise<Outcome<Tender[]>>;
  get(id: number): Promise<Outcome<Tender>>;
  create(input: NewTenderInput): Promise<Outcome<Tender>>;
  update(id: number, patch: TenderPatch): Promise<Outcome<Tender>>;
  remove(id: number): Promise<Outcome<{ id: number }>>;
  bulkStatus(ids: number[], status: TenderStatus): Promise<Outcome<{ updated: number }>>;
  bulkGenerateEoi(ids: number[]): Promise<Outcome<{ generated: number }>>;

  addDraft(id: number, input: NewDraftInput, exportDocument: boolean): Promise<Outcome<Draft>>;
  editDraft(id: number, version: number, patch: DraftPatch): Promise<Outcome<Draft>>;
  advanceDraft(id: number, version: number): Promise<Outcome<Draft>>;
  exportDraft(id: number, version: number): Promise<Outcome<Draft>>;
  sendDraft(id: number, version: number): Promise<Outcome<Draft>>;
  deleteDraft(id: number, version: number): Promise<Outcome<{ id: number; version: number }>>;
  library(): Promise<Outcome<LibraryEntry[]>>;

  dashboard(): Promise<Outcome<DashboardView>>;
  importFeed(): Promise<Outcome<{ added: Tender[] }>>;
  seedIfEmpty(samples: SampleTender[]): Promise<Outcome<{ seeded: number }>>;
}

function ok<T>(data: T, notices: Notice[] = []): Outcome<T> {
  return { ok: true, data, notices };
}

function fail(reason: FailureReason, error: Notice): Failure {
  return { ok: false, reason, error };
}

function notFound(what: string): Failure {
  return fail("not_found", { level: "warning", message: `${what} not found` });
}

export class DefaultTenderService implements TenderService {
  private readonly clock: () => Date;

  constructor(private readonly deps: TenderServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  private today(): Dayjs {
    return toDay(this.clock());
  }

  private async loadTender(id: number): Promise<Outcome<Tender>> {
    const { data, error } = await this.deps.store.loadAll();
    if (error) return fail("unavailable", error);
    const tender = data.find((t) => t.id === id);
    return tender ? ok(tender) : notFound(`Tender ${id}`);
  }

  private async persist<T>(tender: Tender, result: T, notices: Notice[] = []): Promise<Outcome<T>> {
    const { error } = await this.deps.store.save(tender);
    return error ? fail("failed", error) : ok(result, notices);
  }

  async list(filters: TenderFilters): Promise<Outcome<Tender[]>> {
    const { data, error } = await this.deps.store.loadAll();
    // A broken store still renders: empty list plus the notice
    return ok(filterTenders(data, filters, this.today()), error ? [error] : []);
  }

  async get(id: number): Promise<Outcome<Tender>> {
    return this.loadTender(id);
  }

  async create(input: NewTenderInput): Promise<Outcome<Tender>> {
    const { data, error } = await this.deps.store.loadAll();
    if (error) return fail("unavailable", error);

    const tender: Tender = {
      id: nextTenderId(data),
      title: input.title,
      org: input.org ?? "",
      sector: input.sector ?? "Other",
      deadline: input.deadline ?? formatDay(this.today().add(14, "day")),
      description: input.description ?? "",
      status: input.status ?? "Draft",
      score: parseScore(input.score ?? 0),
      assignee: normalizeAssignee(input.assignee),
      drafts: [],
    };
    return this.persist(tender, tender, [{ level: "success", message: "Tender added!" }]);
  }

  async update(id: number, patch: TenderPatch): Promise<Outcome<Tender>> {
    const found = await this.loadTender(id);
    if (!found.ok) return found;
    const t = found.data;

    // Any status may follow any other
    const next: Tender = {
      ...t,
      title: patch.title ?? t.title,
      org: patch.org ?? t.org,
      sector: patch.sector ?? t.sector,
      deadline: patch.deadline ?? t.deadline,
      description: patch.description ?? t.description,
      status: patch.status ?? t.status,
      score: patch.score === undefined ? t.score : parseScore(patch.score),
      assignee: patch.assignee === undefined ? t.assignee : normalizeAssignee(patch.assignee),
    };
    return this.persist(next, next);
  }

  async remove(id: number): Promise<Outcome<{ id: number }>> {
    const { error } = await this.deps.store.delete(id);
    return error ? fail("failed", error) : ok({ id }, [{ level: "success", message: "Tender deleted." }]);
  }

  async bulkStatus(ids: number[], status: TenderStatus): Promise<Outcome<{ updated: number }>> {
    const { data, error } = await this.deps.store.loadAll();
    if (error) return fail("unavailable", error);

    const wanted = new Set(ids);
    const changed = data.filter((t) => wanted.has(t.id)).map((t) => ({ ...t, status }));
    const saved = await this.deps.store.saveMany(changed);
    if (saved.error) return fail("failed", saved.error);
    return ok({ updated: changed.length }, [
      { level: "success", message: `Updated status to '${status}' for ${changed.length} tender(s).` },
    ]);
  }

  async bulkGenerateEoi(ids: number[]): Promise<Outcome<{ generated: number }>> {
    const { data, error } = await this.deps.store.loadAll();
    if (error) return fail("unavailable", error);

    const wanted = new Set(ids);
    const notices: Notice[] = [];
    const changed: Tender[] = [];
    for (const t of data.filter((x) => wanted.has(x.id))) {
      const generated = await this.generate(t, { type: "EOI" }, true);
      if (generated.error) {
        notices.push(generated.error);
        continue;
      }
      changed.push(appendDraft(t, generated.draft));
    }

    const saved = await this.deps.store.saveMany(changed);
    if (saved.error) {
      await discardArtifacts(changed.map((t) => t.drafts[t.drafts.length - 1].file));
      return fail("failed", saved.error);
    }
    notices.push({ level: "success", message: `Generated EOIs for ${changed.length} tender(s).` });
    return ok({ generated: changed.length }, notices);
  }

  /** Builds the next draft and, when asked, writes its document first. */
  private async generate(
    tender: Tender,
    input: NewDraftInput,
    exportDocument: boolean
  ): Promise<{ draft: Draft; error: null } | { draft: null; error: Notice }> {
    const draft = createDraft(tender, input, {
      settings: this.deps.session.settings,
      template: this.deps.template,
      now: this.clock(),
    });
    if (!exportDocument) return { draft, error: null };

    const written = await this.deps.documents.write({
      tenderId: tender.id,
      title: tender.title,
      kind: draft.type,
      version: draft.version,
      body: draft.body,
    });
    if (written.error || !written.path) {
      return {
        draft: null,
        error: written.error ?? { level: "error", message: "Error generating document" },
      };
    }
    return { draft: { ...draft, file: written.path }, error: null };
  }

  async addDraft(id: number, input: NewDraftInput, exportDocument: boolean): Promise<Outcome<Draft>> {
    const found = await this.loadTender(id);
    if (!found.ok) return found;

    const generated = await this.generate(found.data, input, exportDocument);
    if (generated.error) return fail("failed", generated.error);

    const draft = generated.draft;
    const message = draft.file ? `Generated draft: ${draft.file}` : `Created ${draft.type} v${draft.version}`;
    const saved = await this.persist(appendDraft(found.data, draft), draft, [{ level: "success", message }]);
    if (!saved.ok) await discardArtifacts([draft.file]);
    return saved;
  }

  private async withDraft(
    id: number,
    version: number,
    change: (tender: Tender, draft: Draft) => Promise<Outcome<Draft>>
  ): Promise<Outcome<Draft>> {
    const found = await this.loadTender(id);
    if (!found.ok) return found;
    const draft = findDraft(found.data, version);
    if (!draft) return notFound(`Draft ${id}:${version}`);
    return change(found.data, draft);
  }

  async editDraft(id: number, version: number, patch: DraftPatch): Promise<Outcome<Draft>> {
    return this.withDraft(id, version, async (tender, draft) => {
      const next = updateDraft(draft, patch, this.clock());
      return this.persist(replaceDraft(tender, next), next);
    });
  }

  async advanceDraft(id: number, version: number): Promise<Outcome<Draft>> {
    return this.withDraft(id, version, async (tender, draft) => {
      const next = updateDraft(draft, { status: nextDraftStatus(draft.status) }, this.clock());
      return this.persist(replaceDraft(tender, next), next);
    });
  }

  async exportDraft(id: number, version: number): Promise<Outcome<Draft>> {
    return this.withDraft(id, version, async (tender, draft) => {
      const written = await this.deps.documents.write({
        tenderId: tender.id,
        title: tender.title,
        kind: draft.type,
        version: draft.version,
        body: draft.body,
      });
      if (written.error || !written.path) {
        return fail("failed", written.error ?? { level: "error", message: "Error generating document" });
      }
      const next = updateDraft(draft, { file: written.path }, this.clock());
      return this.persist(replaceDraft(tender, next), next, [
        { level: "success", message: `Generated draft: ${written.path}` },
      ]);
    });
  }

  async sendDraft(id: number, version: number): Promise<Outcome<Draft>> {
    return this.withDraft(id, version, async (tender, draft) => {
      const settings = this.deps.session.settings;
      const to = draft.to.trim() || settings.bidEmail;
      const result = await this.deps.mailer.send({
        to,
        cc: draft.cc,
        subject: draft.subject || `${draft.type}: ${tender.title}`,
        body: draft.body || "Please review the attached EOI.",
        attachments: [draft.file, ...draft.attachments].filter((p, i, all) => p && all.indexOf(p) === i),
      });
      if (!result.ok) {
        return fail("failed", { level: "error", message: `Email not sent: ${result.reason}` });
      }
      const next = updateDraft(draft, { status: "Sent" }, this.clock());
      return this.persist(replaceDraft(tender, next), next, [
        { level: "success", message: `Email sent to ${to}` },
      ]);
    });
  }

  async deleteDraft(id: number, version: number): Promise<Outcome<{ id: number; version: number }>> {
    const found = await this.loadTender(id);
    if (!found.ok) return found;
    if (!findDraft(found.data, version)) return notFound(`Draft ${id}:${version}`);
    return this.persist(removeDraft(found.data, version), { id, version });
  }

  async library(): Promise<Outcome<LibraryEntry[]>> {
    const { data, error } = await this.deps.store.loadAll();
    return ok(draftLibrary(data), error ? [error] : []);
  }

  async dashboard(): Promise<Outcome<DashboardView>> {
    const { data, error } = await this.deps.store.loadAll();
    const today = this.today();
    const metrics = computeDashboard(data, {
      today,
      now: this.clock(),
      fileTime: this.deps.fileTime,
    });
    const notices = deadlineNotices(data, today, 3);
    return ok(
      { metrics, notices, lanes: kanbanLanes(data), calendar: calendarPoints(data) },
      error ? [error] : []
    );
  }

  async importFeed(): Promise<Outcome<{ added: Tender[] }>> {
    const feed = await this.deps.source.fetchFeed();
    if (feed.error) return fail("unavailable", feed.error);

    const { data, error } = await this.deps.store.loadAll();
    if (error) return fail("unavailable", error);

    const added = mergeFeed(data, feed.items, nextTenderId(data));
    const saved = await this.deps.store.saveMany(added);
    if (saved.error) return fail("failed", saved.error);
    return ok({ added }, [{ level: "success", message: `${added.length} new tenders added.` }]);
  }

  async seedIfEmpty(samples: SampleTender[]): Promise<Outcome<{ seeded: number }>> {
    const { data, error } = await this.deps.store.loadAll();
    if (error) return fail("unavailable", error);
    if (data.length > 0) return ok({ seeded: 0 });

    const today = this.today();
    const notices: Notice[] = [];
    const seeded: Tender[] = [];
    for (const [i, s] of samples.entries()) {
      const tender: Tender = {
        id: i + 1,
        title: s.title,
        org: s.org,
        sector: s.sector,
        deadline: formatDay(today.add(s.deadlineInDays, "day")),
        description: s.description,
        status: s.status,
        score: 0,
        assignee: normalizeAssignee(s.assignee),
        drafts: [],
      };
      const generated = await this.generate(tender, { type: "EOI" }, true);
      if (generated.error) notices.push(generated.error);
      seeded.push(generated.draft ? appendDraft(tender, generated.draft) : tender);
    }

    const saved = await this.deps.store.saveMany(seeded);
    if (saved.error) return fail("failed", saved.error);
    return ok({ seeded: seeded.length }, notices);
  }
}

/** Removes freshly written artifacts that no saved draft references. */
async function discardArtifacts(files: string[]): Promise<void> {
  for (const file of files.filter(Boolean)) {
    try {
      await fs.rm(file, { force: true });
    } catch (err) {
      console.warn("[TenderService] could not remove unreferenced document", file, err);
    }
  }
}

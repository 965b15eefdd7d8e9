import type { CrmGateway, CrmSession } from "@oficios/core/crm/crmClient";
import type { CrmCasePayload, CrmPersonPayload } from "@oficios/core/crm/mapping";
import type { DocumentCodec } from "@oficios/core/pdf/pdfCodec";
import { createSilentLogger } from "@oficios/core/logger";
import { InMemoryObjectStore } from "@oficios/core/storage/objectStore";
import { InMemoryTrackingStore } from "@oficios/core/tracking/memoryStore";
import { admitBatch, type AdmissionResult } from "../src/ingest/admitBatch";
import { createInMemoryStageQueues, type InMemoryStageQueues } from "../src/memoryQueues";

export const T0 = new Date("2024-05-02T10:00:00.000Z");
export const BATCH_ID = "batch_20240502_100000_0000beef";

const PAGE_BREAK = "\f";

/** Documents are plain text with pages separated by form feeds. */
export class TextPageCodec implements DocumentCodec {
  async readPageTexts(content: Uint8Array): Promise<string[]> {
    return Buffer.from(content).toString("utf8").split(PAGE_BREAK);
  }

  async extractPages(content: Uint8Array, pages: number[]): Promise<Uint8Array> {
    const texts = await this.readPageTexts(content);
    return Buffer.from(pages.map((page) => texts[page] ?? "").join(PAGE_BREAK), "utf8");
  }

  async readText(content: Uint8Array): Promise<string> {
    return Buffer.from(content).toString("utf8").trim();
  }
}

export function textDocument(pages: string[]): Uint8Array {
  return Buffer.from(pages.join(PAGE_BREAK), "utf8");
}

export interface Harness {
  store: InMemoryTrackingStore;
  objects: InMemoryObjectStore;
  queues: InMemoryStageQueues;
  codec: TextPageCodec;
}

export function createHarness(): Harness {
  return {
    store: new InMemoryTrackingStore(() => T0),
    objects: new InMemoryObjectStore(),
    queues: createInMemoryStageQueues(),
    codec: new TextPageCodec(),
  };
}

/** Admits a two-unit batch with id BATCH_ID. */
export async function admitTwoUnitBatch(harness: Harness): Promise<AdmissionResult> {
  return admitBatch(
    {
      ...harness,
      logger: createSilentLogger(),
      pagesPerUnit: 1,
      now: () => T0,
      newBatchId: () => BATCH_ID,
    },
    {
      location: "inbox/jperez_lote.pdf",
      content: textDocument([
        "cantidad_oficios: 2\nempresa: Acme\nOficio 1 dirigido al banco",
        "Oficio 2 dirigido al banco",
      ]),
      channel: "email",
    },
  );
}

/** CRM stand-in keyed like the real one: cases by ExternalRef, persons by case and sequence. */
export class FakeCrmGateway implements CrmGateway {
  readonly cases = new Map<string, { id: string; payload: CrmCasePayload }>();
  readonly persons = new Map<string, CrmPersonPayload & { CaseId: string }>();
  sessionsOpened = 0;
  sessionsClosed = 0;
  failCreatePerson: Error | null = null;
  private nextId = 1;

  async withSession<T>(work: (session: CrmSession) => Promise<T>): Promise<T> {
    this.sessionsOpened += 1;
    try {
      return await work({
        findCaseByExternalRef: async (externalRef) => this.cases.get(externalRef)?.id ?? null,
        createCase: async (payload) => {
          const id = `case-${this.nextId++}`;
          this.cases.set(payload.ExternalRef, { id, payload });
          return id;
        },
        findPerson: async (caseId, sequence) =>
          this.persons.has(`${caseId}#${sequence}`) ? `${caseId}#${sequence}` : null,
        createPerson: async (caseId, payload) => {
          if (this.failCreatePerson) {
            throw this.failCreatePerson;
          }
          const id = `${caseId}#${payload.Sequence}`;
          this.persons.set(id, { CaseId: caseId, ...payload });
          return id;
        },
      });
    } finally {
      this.sessionsClosed += 1;
    }
  }
}

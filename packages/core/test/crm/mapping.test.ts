import { describe, expect, it } from "vitest";
import {
  FULL_TEXT_LIMIT,
  buildSubject,
  determinePriority,
  fullName,
  hasUrgentKeyword,
  mapRecordToCase,
} from "../../src/crm/mapping";
import { emptyRecord } from "../helpers";

const IDS = { batchId: "batch_1", unitId: "batch_1_unit_3" };

describe("mapRecordToCase", () => {
  it("maps a record field by field, normalising dates and joining keywords", () => {
    const record = emptyRecord({
      numero_oficio: "OF-77",
      autoridad: "Fiscalía Anticorrupción",
      fecha_emision: "15/03/2024",
      fecha_recibido: "18-03-24",
      vencimiento: "",
      fecha_resolucion: "no legible",
      monto: 1200.5,
      tipo_oficio: "informacion",
      nivel_confianza: "alto",
      palabras_clave: ["cuentas", "saldo"],
      texto_completo: "Texto del oficio",
      personas: [
        {
          nombres: "Ana  María",
          apellidos: "López",
          identificacion: "8-1-1",
          monto: 10,
          expediente: "EXP-1",
          secuencia: 1,
        },
      ],
    });

    const mapping = mapRecordToCase(record, IDS);

    expect(mapping.case).toMatchObject({
      ExternalRef: "batch_1_unit_3",
      BatchId: "batch_1",
      Subject: "Oficio OF-77 - Fiscalía Anticorrupción",
      OficioNumber: "OF-77",
      IssueDate: "2024-03-15",
      ReceivedDate: "2024-03-18",
      DueDate: null,
      ResolutionDate: null,
      Amount: 1200.5,
      Classification: "informacion",
      ConfidenceLevel: "alto",
      Keywords: "cuentas, saldo",
      FullText: "Texto del oficio",
      Priority: "Medium",
      RequiresUrgentAction: false,
      PersonsCount: 1,
    });
    expect(mapping.persons).toEqual([
      {
        Sequence: 1,
        FirstName: "Ana  María",
        LastName: "López",
        FullName: "Ana María López",
        Identification: "8-1-1",
        Amount: 10,
        ExpedientNumber: "EXP-1",
      },
    ]);
  });

  it("is deterministic and truncates the full text", () => {
    const record = emptyRecord({ texto_completo: "x".repeat(FULL_TEXT_LIMIT + 10) });

    const first = mapRecordToCase(record, IDS);
    const second = mapRecordToCase(record, IDS);

    expect(first).toEqual(second);
    expect(first.case.FullText).toHaveLength(FULL_TEXT_LIMIT);
  });
});

describe("priority rules", () => {
  it("raises priority for a due date, an urgent keyword or a large amount", () => {
    expect(determinePriority(emptyRecord())).toBe("Medium");
    expect(determinePriority(emptyRecord({ vencimiento: "01/06/2024" }))).toBe("High");
    expect(determinePriority(emptyRecord({ palabras_clave: ["Embargo "] }))).toBe("High");
    expect(determinePriority(emptyRecord({ monto: 50000 }))).toBe("Medium");
    expect(determinePriority(emptyRecord({ monto: 50000.01 }))).toBe("High");
    expect(determinePriority(emptyRecord({ vencimiento: "pendiente" }))).toBe("Medium");
  });

  it("matches urgent keywords without case or padding", () => {
    expect(hasUrgentKeyword(["  URGENTE"])).toBe(true);
    expect(hasUrgentKeyword(["aprehensión"])).toBe(true);
    expect(hasUrgentKeyword(["aprehension"])).toBe(false);
  });

  it("builds subjects and full names from what is present", () => {
    expect(buildSubject(emptyRecord(), "batch_1_unit_9")).toBe("Oficio batch_1_unit_9");
    expect(buildSubject(emptyRecord({ numero_oficio: "12" }), "u")).toBe("Oficio 12");
    expect(fullName({ nombres: " Luis ", apellidos: "" })).toBe("Luis");
  });
});

import type { AxiosInstance } from "axios";
import type { Logger } from "pino";
import { z } from "zod";
import type { RecognitionConfig } from "../config";
import { ExternalServiceError, errorMessage } from "../errors";
import type { ExtractionRecord } from "../types";
import { requestWithRetry, type RetryPolicy } from "../client/http";
import { extractJsonObject, normalizeExtraction } from "./normalize";

export interface RecognitionClient {
  recognize(text: string, context: { unitId: string }): Promise<ExtractionRecord>;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

const SYSTEM_PROMPT = [
  "Eres un analista de oficios legales.",
  "Responde únicamente con un objeto JSON con las claves:",
  "numero_oficio, autoridad, fecha_emision, fecha_recibido, oficiado_cliente,",
  "numero_identificacion, expediente, fecha_auto, numero_auto, monto, sucursal_recibido,",
  "carpeta, vencimiento, numero_resolucion, fecha_resolucion, delito, sello_autoridad,",
  "tipo_producto, denunciante, dirigido_banco, documento_sensible, tipo_oficio,",
  "nivel_confianza, palabras_clave, observaciones y personas",
  "(cada persona con nombres, apellidos, identificacion, monto, expediente, secuencia).",
  "Usa null cuando un dato no aparezca.",
].join(" ");

/** Chat-completions client (Mistral and other OpenAI-compatible endpoints). */
export class ChatRecognitionClient implements RecognitionClient {
  constructor(
    private readonly config: RecognitionConfig,
    private readonly http: AxiosInstance,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger,
  ) {}

  async recognize(text: string, context: { unitId: string }): Promise<ExtractionRecord> {
    const payload = await requestWithRetry<unknown>({
      http: this.http,
      policy: this.policy,
      logger: this.logger,
      service: "recognition",
      request: {
        method: "POST",
        url: `${this.config.baseUrl}/chat/completions`,
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json",
        },
        data: {
          model: this.config.model,
          temperature: this.config.temperature,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: text },
          ],
        },
      },
    });

    const parsed = chatCompletionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ExternalServiceError("recognition", `unexpected response shape: ${parsed.error.message}`);
    }

    const content = parsed.data.choices[0].message.content;
    let extracted: unknown;
    try {
      extracted = extractJsonObject(content);
    } catch (error) {
      throw new ExternalServiceError("recognition", `unparseable answer: ${errorMessage(error)}`, null, {
        cause: error,
      });
    }

    const record = normalizeExtraction(extracted);
    this.logger.debug(
      {
        unit_id: context.unitId,
        personas: record.personas.length,
        tipo_oficio: record.tipo_oficio,
      },
      "recognition answer normalized",
    );

    // The canonical record always carries the text the service was given.
    return record.texto_completo ? record : { ...record, texto_completo: text };
  }
}

import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject, ValidateFunction, Options } from "ajv";
import { readFileSync } from "node:fs";

import type { Envelope, EnvelopeType } from "../protocol/messages.js";
import type { RawTerminationJudgment } from "../oracle/types.js";
import { getSchemaPath } from "../utils/asset-root.js";
import type { ParleyConfigFile } from "./types.js";

const SCHEMA_BASE = "https://parley.local/schemas";

const loadSchema = (fileName: string): unknown => {
  const raw = readFileSync(getSchemaPath(fileName), "utf8");
  return JSON.parse(raw) as unknown;
};

const Ajv2020Ctor = Ajv2020 as unknown as new (opts?: Options) => {
  compile: <T>(schema: unknown) => ValidateFunction<T>;
  addSchema: (schema: unknown) => unknown;
};

const ajv = new Ajv2020Ctor({
  allErrors: true,
  strict: true,
  validateSchema: true
});

const applyFormats = addFormats as unknown as (instance: unknown) => void;
applyFormats(ajv);

ajv.addSchema(loadSchema("envelope.schema.json"));

const compileEnvelopeDef = <K extends EnvelopeType>(
  type: K
): ValidateFunction<Extract<Envelope, { type: K }>> =>
  ajv.compile<Extract<Envelope, { type: K }>>({
    $ref: `${SCHEMA_BASE}/envelope.schema.json#/$defs/${type}`
  });

export const envelopeValidators: {
  [K in EnvelopeType]: ValidateFunction<Extract<Envelope, { type: K }>>;
} = {
  register: compileEnvelopeDef("register"),
  session_start: compileEnvelopeDef("session_start"),
  message: compileEnvelopeDef("message"),
  error: compileEnvelopeDef("error"),
  conclusion: compileEnvelopeDef("conclusion"),
  end: compileEnvelopeDef("end")
};

export const validateTerminationJudgment: ValidateFunction<RawTerminationJudgment> = ajv.compile(
  loadSchema("termination-decision.schema.json")
);

export const validateConfigFile: ValidateFunction<ParleyConfigFile> = ajv.compile(
  loadSchema("config.schema.json")
);

export const formatAjvErrors = (
  schemaName: string,
  errors: ErrorObject[] | null | undefined
): string[] => {
  if (!errors || errors.length === 0) {
    return [];
  }

  return errors.map((error) => {
    const path = error.instancePath || "";
    const message = error.message ?? "is invalid";
    return `${schemaName}${path}: ${message}`.trim();
  });
};

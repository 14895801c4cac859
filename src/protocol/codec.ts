import type { ValidateFunction } from "ajv";

import { envelopeValidators, formatAjvErrors } from "../config/schema-validation.js";
import { ProtocolError } from "../core/errors.js";
import type { Envelope, EnvelopeType } from "./messages.js";

const isEnvelopeType = (value: unknown): value is EnvelopeType =>
  typeof value === "string" && Object.prototype.hasOwnProperty.call(envelopeValidators, value);

const parseFrame = (raw: string): unknown => {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    throw new ProtocolError("Frame is not valid JSON");
  }
};

/**
 * Decode one relay frame. Throws {@link ProtocolError} for malformed JSON, an
 * unknown `type` or a payload that fails its envelope schema.
 */
export const decodeEnvelope = (raw: string): Envelope => {
  const parsed = parseFrame(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ProtocolError("Frame is not a JSON object");
  }

  const type = "type" in parsed ? parsed.type : undefined;
  if (!isEnvelopeType(type)) {
    throw new ProtocolError(`Unknown message type ${JSON.stringify(type ?? null)}`);
  }

  const validate: ValidateFunction<Envelope> = envelopeValidators[type];
  if (!validate(parsed)) {
    throw new ProtocolError(`Invalid ${type} frame`, formatAjvErrors(type, validate.errors));
  }
  return parsed;
};

export const encodeEnvelope = (envelope: Envelope): string => JSON.stringify(envelope);

/** Text of a WebSocket frame, whichever buffer shape the socket delivered. */
export const frameText = (data: Buffer | ArrayBuffer | Buffer[]): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
};

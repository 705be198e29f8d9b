/**
 * Payload Validation Module
 *
 * Validates fantasy API payloads against JSON schemas using ajv before any
 * component reads them. Schemas check only the fields the pipeline depends
 * on and allow additional properties, so upstream additions pass through.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { BootstrapPayload, PlayerSummaryPayload } from '../models/fpl-api';
import { PayloadValidationError, ValidationDetails } from '../models/errors';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
  // keep offending values on errors for the details messages
  verbose: true,
});

// date-time for event deadlines
addFormats(ajv);

const eventSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer', minimum: 1 },
    name: { type: 'string' },
    deadline_time: { type: 'string', format: 'date-time', nullable: true },
    finished: { type: 'boolean' },
    data_checked: { type: 'boolean' },
  },
  required: ['id', 'finished', 'data_checked'],
};

const teamSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    name: { type: 'string' },
    short_name: { type: 'string' },
  },
  required: ['id', 'name', 'short_name'],
};

const playerSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer', minimum: 1 },
    first_name: { type: 'string' },
    second_name: { type: 'string' },
    web_name: { type: 'string' },
  },
  required: ['id'],
};

const bootstrapSchema = {
  type: 'object',
  properties: {
    events: { type: 'array', items: eventSchema },
    teams: { type: 'array', items: teamSchema },
    elements: { type: 'array', items: playerSchema },
  },
  required: ['events', 'teams', 'elements'],
};

const historyEntrySchema = {
  type: 'object',
  properties: {
    round: { type: 'integer' },
  },
  required: ['round'],
};

const playerSummarySchema = {
  type: 'object',
  properties: {
    history: { type: 'array', items: historyEntrySchema },
  },
  required: ['history'],
};

// Compile schemas
const validateBootstrap: ValidateFunction<BootstrapPayload> = ajv.compile<BootstrapPayload>(bootstrapSchema);
const validatePlayerSummary: ValidateFunction<PlayerSummaryPayload> =
  ajv.compile<PlayerSummaryPayload>(playerSummarySchema);

/**
 * Format ajv validation errors into field-specific error details
 */
export function formatValidationErrors(errors: ErrorObject[]): ValidationDetails {
  const details: ValidationDetails = {};

  for (const error of errors) {
    const field = error.instancePath ? error.instancePath.substring(1) : 'payload';

    let message = error.message || 'Validation failed';

    if (error.keyword === 'required') {
      message = `Missing required field: ${error.params.missingProperty}`;
    } else if (error.keyword === 'type') {
      message = `Expected ${error.params.type}, received ${typeof error.data}`;
    } else if (error.keyword === 'format') {
      message = `Invalid format, expected ${error.params.format}`;
    } else if (error.keyword === 'minimum') {
      message = `Must be >= ${error.params.limit}`;
    }

    details[field] = message;
  }

  return details;
}

/**
 * Validate bootstrap-static payload
 *
 * @throws PayloadValidationError with field-specific details if validation fails
 */
export function validateBootstrapPayload(payload: unknown): BootstrapPayload {
  if (validateBootstrap(payload)) {
    return payload;
  }
  throw new PayloadValidationError(
    'Invalid bootstrap payload',
    formatValidationErrors(validateBootstrap.errors ?? [])
  );
}

/**
 * Validate element-summary payload
 *
 * @throws PayloadValidationError with field-specific details if validation fails
 */
export function validatePlayerSummaryPayload(payload: unknown): PlayerSummaryPayload {
  if (validatePlayerSummary(payload)) {
    return payload;
  }
  throw new PayloadValidationError(
    'Invalid player summary payload',
    formatValidationErrors(validatePlayerSummary.errors ?? [])
  );
}

// src/jobs/jobRegistry.ts

interface IJobSchema {
    type: string;
    required: string[];
    properties: Record<string, 'string' | 'number' | 'boolean' | 'array' | 'object'>;
}

export interface IJob {
    jobId: string;
    type: string;
    payload: Record<string, unknown>;
}

// --- Schemas ---
const PRUNE_EXPIRED_SCHEMA: IJobSchema = {
    type: 'devices.prune_expired',
    required: [],
    properties: {
        credentialFile: 'string', // Overrides APNS_CERTIFICATE for the feedback connection
    },
};

const JOB_SCHEMAS: Record<string, IJobSchema> = {
    [PRUNE_EXPIRED_SCHEMA.type]: PRUNE_EXPIRED_SCHEMA,
};

function typeMatches(expected: IJobSchema['properties'][string], value: unknown): boolean {
    switch (expected) {
        case 'array':
            return Array.isArray(value);
        case 'object':
            return typeof value === 'object' && value !== null && !Array.isArray(value);
        default:
            return typeof value === expected;
    }
}

/**
 * Validates a job payload against its registered schema.
 * @throws {Error} - 'JobTypeNotFound' or 'SchemaValidationFailed'.
 */
export function validateJobPayload(jobType: string, payload: Record<string, unknown>): void {
    const schema = JOB_SCHEMAS[jobType];
    if (!schema) {
        throw new Error('JobTypeNotFound');
    }

    const errors: string[] = [];

    // 1. Check Required Fields
    schema.required.forEach(field => {
        if (!Object.prototype.hasOwnProperty.call(payload, field)) {
            errors.push(`Missing required field: ${field}`);
        }
    });

    // 2. Check Types
    for (const [field, value] of Object.entries(payload)) {
        const expectedType = schema.properties[field];
        if (expectedType && !typeMatches(expectedType, value)) {
            const actualType = Array.isArray(value) ? 'array' : typeof value;
            errors.push(`Invalid type for field ${field}: expected ${expectedType}, got ${actualType}`);
        }
    }

    if (errors.length > 0) {
        throw new Error(`SchemaValidationFailed: ${errors.join('; ')}`);
    }
}

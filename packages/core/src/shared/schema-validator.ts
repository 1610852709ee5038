type AjvValidateFunction = ((data: unknown) => boolean) & {
  errors?: Array<{ instancePath?: string; message?: string }> | null;
};
interface AjvInstance {
  compile(schema: Record<string, unknown>): AjvValidateFunction;
}

// Shared ajv instance, created on first use.
let _ajv: AjvInstance | null = null;
async function getAjv(): Promise<AjvInstance> {
  if (_ajv) return _ajv;
  const mod = await import('ajv');
  const AjvClass = mod.default ?? mod;
  _ajv = new (AjvClass as unknown as {
    new (opts: { allErrors: boolean; useDefaults: boolean }): AjvInstance;
  })({ allErrors: true, useDefaults: true });
  return _ajv;
}

export interface SchemaValidationResult {
  valid: boolean;
  errors: string[];
}

export interface SchemaValidator {
  /** Validates in place; `default` keywords fill missing properties. */
  validate(data: unknown): SchemaValidationResult;
}

export async function createSchemaValidator(schema: Record<string, unknown>): Promise<SchemaValidator> {
  const ajv = await getAjv();
  const validateFn = ajv.compile(schema);
  return {
    validate(data: unknown): SchemaValidationResult {
      if (validateFn(data)) return { valid: true, errors: [] };
      const errors = (validateFn.errors ?? []).map(
        (e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`,
      );
      return { valid: false, errors };
    },
  };
}

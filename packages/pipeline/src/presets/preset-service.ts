import type { LoggerMethods } from '@pagemill/logger';
import type { DoclingPreset, OcrPreset } from '@pagemill/model';
import type { z } from 'zod';

import type { DoclingPresetRecord, OcrPresetRecord } from '../db/records';
import type {
  PresetFields,
  PresetRepository,
  PresetRow,
  PresetShape,
} from '../db/repositories/preset-repository';
import type { ValidationIssue } from '../errors/pipeline-errors';

import { omit } from 'es-toolkit';

import { PresetValidationError } from '../errors/pipeline-errors';
import {
  BUILT_IN_PRESET_NAME,
  DEFAULT_DOCLING_PRESET,
  DEFAULT_OCR_PRESET,
} from './default-presets';
import { doclingPresetSchema, ocrPresetSchema } from './preset-schemas';

export interface PresetDefinition<P extends PresetShape> {
  /** Used in log and error messages, e.g. `OCR preset` */
  label: string;
  schema: z.ZodType<PresetFields<P>, z.ZodTypeDef, unknown>;
  patchSchema: z.ZodType<Partial<PresetFields<P>>, z.ZodTypeDef, unknown>;
  builtIn: PresetFields<P>;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * CRUD for one preset kind. Inputs are validated with zod; at most one
 * preset of the kind is the default.
 */
export class PresetService<P extends PresetShape, R extends PresetRow> {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly repository: PresetRepository<P, R>,
    private readonly definition: PresetDefinition<P>,
  ) {}

  /** Default first, then by name */
  list(): P[] {
    return this.repository
      .list()
      .sort(
        (a, b) =>
          Number(b.isDefault) - Number(a.isDefault) ||
          a.name.localeCompare(b.name),
      );
  }

  get(id: string): P | null {
    return this.repository.findById(id);
  }

  /**
   * @throws PresetValidationError
   */
  create(input: unknown): P {
    const fields = this.parse(this.definition.schema, input);
    this.assertUniqueName(fields.name);

    const preset = this.repository.insert(fields);
    this.logger.info(
      `[PresetService] Created ${this.definition.label} ${preset.name} (${preset.id})`,
    );
    return preset;
  }

  /**
   * Apply a partial update.
   *
   * @throws PresetValidationError for invalid input or an unknown id
   */
  update(id: string, patch: unknown): P {
    const current = this.require(id);
    const changes = this.parse(this.definition.patchSchema, patch);
    if (changes.name !== undefined && changes.name !== current.name) {
      this.assertUniqueName(changes.name);
    }

    const fields: PresetFields<P> = {
      ...omit(current, ['id', 'createdAt', 'updatedAt']),
      ...changes,
    };
    const updated = this.repository.replace(id, fields);
    if (!updated) {
      throw this.notFound(id);
    }
    return updated;
  }

  /**
   * @throws PresetValidationError for an unknown id
   */
  delete(id: string): void {
    if (!this.repository.delete(id)) {
      throw this.notFound(id);
    }
    this.logger.info(`[PresetService] Deleted ${this.definition.label} ${id}`);
  }

  /**
   * Make `id` the only default of its kind.
   *
   * @throws PresetValidationError for an unknown id
   */
  setDefault(id: string): P {
    const preset = this.repository.setDefault(id);
    if (!preset) {
      throw this.notFound(id);
    }
    this.logger.info(
      `[PresetService] ${this.definition.label} ${preset.name} is now the default`,
    );
    return preset;
  }

  /**
   * The default preset. When none is flagged, the preset named `default`
   * is flagged, or the built-in one is created.
   */
  getDefault(): P {
    const current = this.repository.findDefault();
    if (current) {
      return current;
    }

    const named = this.repository
      .list()
      .find((preset) => preset.name === BUILT_IN_PRESET_NAME);
    if (named) {
      return this.setDefault(named.id);
    }

    const created = this.repository.insert(this.definition.builtIn);
    this.logger.info(
      `[PresetService] Created built-in ${this.definition.label} (${created.id})`,
    );
    return created;
  }

  private require(id: string): P {
    const preset = this.repository.findById(id);
    if (!preset) {
      throw this.notFound(id);
    }
    return preset;
  }

  private assertUniqueName(name: string): void {
    if (this.repository.list().some((preset) => preset.name === name)) {
      throw new PresetValidationError(
        `${this.definition.label} name already exists`,
        [{ path: 'name', message: `${name} is taken` }],
      );
    }
  }

  private notFound(id: string): PresetValidationError {
    return new PresetValidationError(
      `${this.definition.label} ${id} not found`,
    );
  }

  private parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    input: unknown,
  ): T {
    const result = schema.safeParse(input);
    if (!result.success) {
      throw new PresetValidationError(
        `Invalid ${this.definition.label}`,
        toValidationIssues(result.error),
      );
    }
    return result.data;
  }
}

export const OCR_PRESET_DEFINITION: PresetDefinition<OcrPreset> = {
  label: 'OCR preset',
  schema: ocrPresetSchema,
  patchSchema: ocrPresetSchema.partial(),
  builtIn: DEFAULT_OCR_PRESET,
};

export const DOCLING_PRESET_DEFINITION: PresetDefinition<DoclingPreset> = {
  label: 'Docling preset',
  schema: doclingPresetSchema,
  patchSchema: doclingPresetSchema.partial(),
  builtIn: DEFAULT_DOCLING_PRESET,
};

export type OcrPresetService = PresetService<OcrPreset, OcrPresetRecord>;
export type DoclingPresetService = PresetService<
  DoclingPreset,
  DoclingPresetRecord
>;

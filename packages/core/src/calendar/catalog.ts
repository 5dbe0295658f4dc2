/**
 * Template Catalogs
 *
 * JsonTemplateCatalog reads the crop calendar and farming tips from JSON
 * files (by default the ones bundled in packages/core/data/).
 * StaticTemplateCatalog serves templates held in memory.
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import type { z } from 'zod'
import { CatalogLoadError, errorMessage } from './errors.js'
import { cropCalendarFileSchema, farmingTipsFileSchema } from './schema.js'
import type { CropSchedule, FarmingTip, TemplateCatalog } from './types.js'

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../data/crop-calendar.json', import.meta.url),
)
export const DEFAULT_TIPS_PATH = fileURLToPath(new URL('../../data/farming-tips.json', import.meta.url))

export interface JsonTemplateCatalogOptions {
  /** Crop calendar file (default: bundled crop-calendar.json) */
  schedulesPath?: string
  /** Farming tips file (default: bundled farming-tips.json) */
  tipsPath?: string
}

async function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S>> {
  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (err) {
    throw new CatalogLoadError(`Could not read ${filePath}: ${errorMessage(err)}`, { cause: err })
  }

  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (err) {
    throw new CatalogLoadError(`Could not parse ${filePath}: ${errorMessage(err)}`, { cause: err })
  }

  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    const where = first ? `${first.path.join('.')}: ${first.message}` : 'invalid content'
    throw new CatalogLoadError(`Invalid catalog ${filePath} (${where})`, { cause: parsed.error })
  }

  return parsed.data
}

export class JsonTemplateCatalog implements TemplateCatalog {
  private schedulesPath: string
  private tipsPath: string

  constructor(options: JsonTemplateCatalogOptions = {}) {
    this.schedulesPath = options.schedulesPath ?? DEFAULT_CATALOG_PATH
    this.tipsPath = options.tipsPath ?? DEFAULT_TIPS_PATH
  }

  async loadCropSchedules(): Promise<CropSchedule[]> {
    const file = await readJsonFile(this.schedulesPath, cropCalendarFileSchema)
    return file.crop_schedules
  }

  /**
   * Tips are optional: a missing tips file yields an empty list.
   */
  async loadFarmingTips(): Promise<FarmingTip[]> {
    if (!existsSync(this.tipsPath)) {
      return []
    }
    return readJsonFile(this.tipsPath, farmingTipsFileSchema)
  }
}

export class StaticTemplateCatalog implements TemplateCatalog {
  private schedules: CropSchedule[]
  private tips: FarmingTip[]

  constructor(schedules: CropSchedule[], tips: FarmingTip[] = []) {
    this.schedules = schedules
    this.tips = tips
  }

  async loadCropSchedules(): Promise<CropSchedule[]> {
    return [...this.schedules]
  }

  async loadFarmingTips(): Promise<FarmingTip[]> {
    return [...this.tips]
  }
}

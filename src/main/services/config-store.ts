import path from "node:path";
import { CONFIG_FILE, DEFAULT_SETTINGS } from "../../shared/constants.js";
import type { SchedulerSettings } from "../../shared/types.js";
import { isRecord, JsonFile } from "./json-file.js";
import { sanitizeSchedulerSettings } from "./settings-utils.js";

export class ConfigStore {
  private readonly file: JsonFile;
  private readonly defaults: SchedulerSettings;

  public constructor(dataDir: string) {
    this.file = new JsonFile(path.join(dataDir, CONFIG_FILE));
    this.defaults = sanitizeSchedulerSettings({ ...DEFAULT_SETTINGS }, { ...DEFAULT_SETTINGS });
  }

  public getDefaults(): SchedulerSettings {
    return {
      ...this.defaults
    };
  }

  public async load(): Promise<SchedulerSettings> {
    const parsed = await this.file.read();
    if (!isRecord(parsed)) {
      return this.getDefaults();
    }
    return sanitizeSchedulerSettings(parsed, this.defaults);
  }

  public async save(next: SchedulerSettings): Promise<void> {
    await this.file.write(sanitizeSchedulerSettings(next, this.defaults));
  }
}

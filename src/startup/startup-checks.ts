import { generationSettings } from "../config/index.js";
import { getTemplate } from "../modules/latex/templates.js";

export interface StartupCheckOptions {
  defaultTemplate?: string;
}

/** Fails before the server listens when the configured default template is not registered. */
export async function runStartupChecks(options?: StartupCheckOptions): Promise<void> {
  getTemplate(options?.defaultTemplate ?? generationSettings.defaultTemplate);
}

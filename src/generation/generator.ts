import type { LLMProvider } from "../core/llm/provider.js";
import type { Logger } from "../utils/logger.js";
import type { AttachmentDescriptor } from "../publishing/types.js";
import { describeError } from "../core/step-result.js";
import {
  decodeAttachments,
  summarizeAttachments,
  type DecodedAttachment,
} from "./attachments.js";
import {
  SYSTEM_PROMPT,
  buildFallbackReadme,
  buildFallbackResponse,
  buildUserPrompt,
  extractExpectedFiles,
} from "./prompt.js";
import {
  parseGeneratedFiles,
  type GeneratedFiles,
  type ParseFormat,
} from "./response-parser.js";

export interface SiteGeneratorOptions {
  model: string;
  maxTokens: number;
  attachmentsDir: string;
}

export interface GenerateInput {
  brief: string;
  round: number;
  attachments?: readonly AttachmentDescriptor[];
  /** Already-decoded attachments; when given, `attachments` is not decoded again. */
  decoded?: readonly DecodedAttachment[];
  checks?: readonly string[];
  previousReadme?: string | null;
}

export interface GenerationResult {
  files: GeneratedFiles;
  attachments: DecodedAttachment[];
  expectedFiles: string[];
  source: "model" | "fallback";
  format: ParseFormat;
}

/**
 * Turns a brief into a multi-file static site through the completion
 * provider. Provider failures fall back to a canned two-file site, so
 * `generate` always resolves with at least one file.
 */
export class SiteGenerator {
  constructor(
    private provider: LLMProvider,
    private options: SiteGeneratorOptions,
    private logger: Logger
  ) {}

  async generate(input: GenerateInput): Promise<GenerationResult> {
    const attachments = input.decoded
      ? [...input.decoded]
      : await decodeAttachments(
          input.attachments ?? [],
          this.options.attachmentsDir,
          this.logger
        );
    const attachmentSummary = await summarizeAttachments(attachments);
    const checks = input.checks ?? [];
    const expectedFiles = extractExpectedFiles(input.brief);

    const userPrompt = buildUserPrompt({
      brief: input.brief,
      round: input.round,
      previousReadme: input.previousReadme,
      attachmentSummary,
      checks,
      expectedFiles,
    });

    let text: string;
    let source: GenerationResult["source"] = "model";
    try {
      text = await this.complete(userPrompt);
      this.logger.info(
        { provider: this.provider.name, model: this.options.model },
        "Generated multi-file project"
      );
    } catch (err) {
      this.logger.warn(
        { provider: this.provider.name, error: describeError(err) },
        "Completion failed, using fallback files"
      );
      text = buildFallbackResponse(input.brief);
      source = "fallback";
    }

    const { files, format } = parseGeneratedFiles(text, () =>
      buildFallbackReadme({
        brief: input.brief,
        checks,
        attachmentSummary,
        round: input.round,
      })
    );

    const missing = expectedFiles.filter((name) => !(name in files));
    this.logger.info(
      { files: Object.keys(files), expectedFiles, format, source },
      "Parsed files from model output"
    );
    if (missing.length > 0) {
      this.logger.warn({ missing }, "Model output is missing expected files");
    }

    return { files, attachments, expectedFiles, source, format };
  }

  private async complete(userPrompt: string): Promise<string> {
    const response = await this.provider.chat({
      model: this.options.model,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: userPrompt }],
      maxTokens: this.options.maxTokens,
    });

    if (!response.text || response.text.trim() === "") {
      throw new Error("Completion returned no text");
    }
    if (response.stopReason === "max_tokens") {
      this.logger.warn(
        { outputTokens: response.usage.outputTokens },
        "Completion hit the token limit; the last file may be truncated"
      );
    }
    return response.text;
  }
}

import { z } from 'zod';
import type { StageRequest } from '../orchestrator/agent-coordinator';
import { BackendError } from '../llm/errors';
import { BackendAgent } from './base-agent';
import { ContextBuilder } from './context-builder';
import { FIX_SYSTEM_PROMPT, getFixPrompt } from './prompts/fix';

export const FixProposalSchema = z.object({
  summary: z.string().default(''),
  files: z
    .array(
      z.object({
        path: z.string().min(1),
        content: z.string(),
      }),
    )
    .min(1, 'at least one file is required'),
});

export type FixProposal = z.infer<typeof FixProposalSchema>;

/**
 * Asks the backend for complete replacement files, writes them into the
 * target and returns a summary of what changed.
 */
export class FixerAgent extends BackendAgent {
  readonly stage = 'FIX' as const;
  readonly action = 'FIX' as const;

  async perform(request: StageRequest): Promise<string> {
    const workspace = this.workspace(request.target);
    const files = await this.readSources(workspace);
    const context = ContextBuilder.build(request.target, files, 'REFACTORING PLAN OR TEST FEEDBACK', request.currentOutput);

    const content = await this.ask(request.backend, FIX_SYSTEM_PROMPT, getFixPrompt(context));
    const proposal = parseFixProposal(content, request.backend);

    // Resolve every path before touching disk so a bad path writes nothing
    for (const file of proposal.files) {
      workspace.resolve(file.path);
    }
    const written: string[] = [];
    for (const file of proposal.files) {
      written.push(await workspace.writeFile(file.path, file.content));
    }

    return formatFixSummary(proposal.summary, written);
  }
}

export function formatFixSummary(summary: string, written: string[]): string {
  const lines = [`FIX SUMMARY: ${summary.trim() || '(no summary provided)'}`, 'Files written:', ...written.map((f) => `- ${f}`)];
  return lines.join('\n');
}

/** Parse a fix proposal, tolerating markdown fences and prose around the JSON */
export function parseFixProposal(content: string, backend: string): FixProposal {
  const raw = parseJsonLoosely(content);
  if (raw === undefined) {
    throw new BackendError(`Fix proposal is not valid JSON: "${preview(content)}"`, 'MALFORMED_RESPONSE', { backend });
  }

  const result = FixProposalSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new BackendError(`Fix proposal has the wrong shape: ${issues}`, 'MALFORMED_RESPONSE', { backend });
  }
  return result.data;
}

function parseJsonLoosely(content: string): unknown {
  // First pass: strip common markdown code fences and parse directly.
  const cleaned = content.replace(/```json|```/g, '').trim();
  try {
    return JSON.parse(cleaned);
  } catch {
    // Second pass: the first '{' to the last '}'.
    const firstBrace = cleaned.indexOf('{');
    const lastBrace = cleaned.lastIndexOf('}');
    if (firstBrace === -1 || lastBrace <= firstBrace) {
      return undefined;
    }
    try {
      return JSON.parse(cleaned.slice(firstBrace, lastBrace + 1));
    } catch {
      return undefined;
    }
  }
}

function preview(content: string): string {
  const trimmed = content.trim();
  return trimmed.length > 200 ? `${trimmed.slice(0, 200)}...` : trimmed;
}

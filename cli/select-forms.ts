import * as p from "@clack/prompts";
import type { SurveyForm } from "@/lib/source/submissions";

export type Selection = { ok: true; indices: number[] } | { ok: false; error: string };

/**
 * Parse the interactive answer: "all", or 1-based indices separated by
 * commas ("1, 3,4"). Returns 0-based indices in the order given, without
 * repeats.
 */
export function parseSelection(input: string, count: number): Selection {
  const text = input.trim().toLowerCase();
  if (text === "all") {
    return { ok: true, indices: Array.from({ length: count }, (_, i) => i) };
  }

  const indices: number[] = [];
  for (const part of text.split(",").map((s) => s.trim()).filter(Boolean)) {
    if (!/^\d+$/.test(part)) return { ok: false, error: `"${part}" is not a number` };
    const n = Number(part);
    if (n < 1 || n > count) return { ok: false, error: `${n} is out of range (1-${count})` };
    if (!indices.includes(n - 1)) indices.push(n - 1);
  }

  if (indices.length === 0) return { ok: false, error: 'Enter form numbers or "all"' };
  return { ok: true, indices };
}

export function selectByUid(
  forms: SurveyForm[],
  uids: string[]
): { selected: SurveyForm[]; missing: string[] } {
  const byUid = new Map(forms.map((f) => [f.uid, f]));
  const selected: SurveyForm[] = [];
  const missing: string[] = [];
  for (const uid of uids) {
    const form = byUid.get(uid);
    if (!form) missing.push(uid);
    else if (!selected.includes(form)) selected.push(form);
  }
  return { selected, missing };
}

export function formatFormList(forms: SurveyForm[]): string {
  return forms
    .map((form, i) => {
      const count = form.submissionCount === undefined ? "" : ` - ${form.submissionCount} submissions`;
      return `${i + 1}. ${form.name} (${form.uid})${count}`;
    })
    .join("\n");
}

/** Ask which forms to process. Resolves to null when the user cancels. */
export async function promptForForms(forms: SurveyForm[]): Promise<SurveyForm[] | null> {
  p.intro("Select forms to transfer");
  p.note(formatFormList(forms), `${forms.length} forms available`);

  const answer = await p.text({
    message: 'Form numbers, comma-separated, or "all"',
    placeholder: "1,3",
    validate: (value) => {
      const selection = parseSelection(value, forms.length);
      if (!selection.ok) return selection.error;
    },
  });

  if (p.isCancel(answer)) {
    p.cancel("No forms selected.");
    return null;
  }

  const selection = parseSelection(answer, forms.length);
  if (!selection.ok) return null;
  const selected = selection.indices.map((i) => forms[i]).filter((f): f is SurveyForm => !!f);
  p.outro(`Processing ${selected.length} form(s)`);
  return selected;
}

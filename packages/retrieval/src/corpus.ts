import { promises as fs } from 'fs';
import { basename, join } from 'path';
import { ensureDir } from 'fs-extra';
import { errorMessage, type Logger } from '@leansmith/shared';
import { splitSections } from './chunker';
import type { SourceDocument } from './types';

export interface DefaultDocument {
  fileName: string;
  content: string;
}

/** Written to an empty documents directory so a fresh index is never empty. */
export const DEFAULT_DOCUMENTS: readonly DefaultDocument[] = [
  {
    fileName: 'default_tactics.txt',
    content: `Lean 4 Basic Tactics:
- \`rfl\`: reflexivity, proves \`a = a\`
- \`simp\`: simplification using simp lemmas
- \`norm_num\`: normalize numerical expressions
- \`ring\`: prove ring equations
- \`omega\`: arithmetic over natural numbers and integers
- \`sorry\`: placeholder (should not be used in final proofs)

Example:
theorem add_comm (a b : Nat) : a + b = b + a := by
  ring
`,
  },
  {
    fileName: 'default_functions.txt',
    content: `Lean 4 Function Definitions:
- Use \`def\` for definitions
- Specify types explicitly
- Use pattern matching with \`match\`

Example:
def factorial (n : Nat) : Nat :=
  match n with
  | 0 => 1
  | n + 1 => (n + 1) * factorial n

def max (a b : Int) : Int :=
  if a >= b then a else b
`,
  },
  {
    fileName: 'default_proofs.txt',
    content: `Lean 4 Proof Tactics:
- \`intro\`: introduce hypotheses
- \`apply\`: apply a theorem
- \`exact\`: provide exact proof term
- \`rw\`: rewrite using equation
- \`split\`: case analysis
- \`contradiction\`: prove false from contradictory hypotheses
- \`unfold\`: unfold definitions

Example:
theorem modus_ponens (P Q : Prop) (hpq : P → Q) (hp : P) : Q := by
  apply hpq
  exact hp
`,
  },
];

/**
 * Reads every `*.txt` file in `documentsDir`, sorted by file name, and
 * splits each into sections. Unreadable files are logged and skipped.
 */
export async function loadCorpus(documentsDir: string, logger: Logger): Promise<SourceDocument[]> {
  await ensureDir(documentsDir);
  const entries = await fs.readdir(documentsDir, { withFileTypes: true });
  const fileNames = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.txt'))
    .map((entry) => entry.name)
    .sort();

  const documents: SourceDocument[] = [];
  for (const fileName of fileNames) {
    const path = join(documentsDir, fileName);
    try {
      const content = await fs.readFile(path, 'utf8');
      documents.push(...splitSections(content, basename(path)));
    } catch (error) {
      await logger.warn(`Skipping unreadable document ${path}: ${errorMessage(error)}`);
    }
  }
  return documents;
}

/**
 * Writes the built-in documents into `documentsDir` and returns them as
 * source documents.
 */
export async function materializeDefaultDocuments(documentsDir: string): Promise<SourceDocument[]> {
  await ensureDir(documentsDir);
  const documents: SourceDocument[] = [];
  for (const doc of DEFAULT_DOCUMENTS) {
    await fs.writeFile(join(documentsDir, doc.fileName), doc.content, 'utf8');
    documents.push(...splitSections(doc.content, doc.fileName));
  }
  return documents;
}

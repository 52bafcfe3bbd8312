import lsp from 'vscode-languageserver/node.js';
import type { Hover, Position } from 'vscode-languageserver/node.js';

import { describeMnemonic } from '../../isa/opcodes.js';
import type { DocumentState } from '../../workspace/state.js';
import { tokenAt } from '../../workspace/text.js';
import { findMacro, macroSignature, type FeatureContext } from './context.js';

function markdown(value: string): Hover {
  return { contents: { kind: lsp.MarkupKind.Markdown, value } };
}

function plaintext(value: string): Hover {
  return { contents: { kind: lsp.MarkupKind.PlainText, value } };
}

export function hover(doc: DocumentState, position: Position, ctx: FeatureContext): Hover | null {
  const token = tokenAt(doc.text, position.line, position.character);
  if (token.length === 0) return null;

  const label = doc.labelMap.get(token);
  if (label !== undefined) {
    return markdown(`${label.name} = $${label.address.toString(16).toUpperCase()}`);
  }

  const opcode = describeMnemonic(token);
  if (opcode !== undefined) {
    const upper = token.toUpperCase();
    let text = `**${upper}** - ${opcode.name}\n\n${opcode.summary}\n\n**Flags:** ${opcode.flags}`;
    if (opcode.cycles !== 'None') text += `\n\n**Cycles:** ${opcode.cycles}`;
    return markdown(text);
  }

  const name = token.replace(/^!/, '');
  const define = doc.defineMap.get(name);
  if (define !== undefined) {
    return plaintext(define.value.length > 0 ? `!${define.name} = ${define.value}` : `!${define.name}`);
  }

  const macro = findMacro(name.replace(/^%/, ''), doc, ctx);
  if (macro !== undefined) return plaintext(`macro ${macroSignature(macro)}`);
  return null;
}

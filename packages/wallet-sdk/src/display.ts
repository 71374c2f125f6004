/**
 * formatDisplayMessage - Human-readable summary of a command for the wallet's
 * confirmation screen.
 */

import { bytesToHex, formatEther, formatGwei } from 'viem';
import type { Command } from '@linksign/core';

const TITLES: Record<Command['operation'], string> = {
  'sign-message': 'Sign Message Request',
  'sign-personal-message': 'Sign Personal Message Request',
  'sign-transaction': 'Sign Transaction Request',
};

// eslint-disable-next-line no-control-regex
const CONTROL_PATTERN = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/;

function decodeText(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function messageLine(message: Uint8Array): string {
  const text = decodeText(message);
  if (text !== undefined && !CONTROL_PATTERN.test(text)) {
    return `Message: ${text}`;
  }
  return `Message (hex): ${bytesToHex(message)}`;
}

/**
 * Format a Command into a multi-line display message.
 */
export function formatDisplayMessage(command: Command): string {
  const lines: string[] = [TITLES[command.operation], ''];

  if (command.operation === 'sign-transaction') {
    const tx = command.transaction;
    lines.push(`To: ${tx.to}`);
    lines.push(`Amount: ${formatEther(tx.amount)} ETH`);
    lines.push(`Gas price: ${formatGwei(tx.gasPrice)} gwei`);
    lines.push(`Gas limit: ${tx.gasLimit.toString()}`);
    lines.push(`Nonce: ${tx.nonce.toString()}`);
    if (tx.payload !== undefined) {
      lines.push(`Data: ${String(tx.payload.length)} bytes`);
    }
  } else {
    lines.push(`Account: ${command.address ?? 'default account'}`);
    lines.push(messageLine(command.message));
  }

  lines.push(`Callback: ${command.callback?.href ?? 'none'}`);
  return lines.join('\n');
}

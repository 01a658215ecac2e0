/**
 * Chat texts sent while handling a document.
 */

import { formatBytes } from '@docdrop/core';

export function startingText(fileName: string, size: number): string {
  return `📥 Downloading: ${fileName}\n📊 Size: ${formatBytes(size)}\n⏳ Starting download...`;
}

export function connectingText(fileName: string, size: number): string {
  return `📥 Downloading: ${fileName}\n📊 Size: ${formatBytes(size)}\n🔄 Connecting...`;
}

export function successText(fileName: string, bytes: number, bytesPerSecond: number, savedTo: string): string {
  return (
    `✅ Downloaded: ${fileName}\n` +
    `📊 Size: ${formatBytes(bytes)}\n` +
    `⚡ Avg Speed: ${formatBytes(bytesPerSecond)}/s\n` +
    `📁 Saved to: ${savedTo}`
  );
}

export function createFailedText(fileName: string): string {
  return `❌ Error creating file: ${fileName}\n💾 Check disk space and permissions`;
}

export function diskFailedText(fileName: string): string {
  return `❌ Download failed: ${fileName}\n💾 Disk error occurred`;
}

export function networkFailedText(fileName: string): string {
  return `❌ Download failed: ${fileName}\n🌐 Network error occurred`;
}

export function cancelledText(fileName: string): string {
  return `⚠️ Download cancelled: ${fileName}\n🛑 The agent is shutting down`;
}

export function extensionRejectedText(
  fileName: string,
  extension: string,
  allowed: readonly string[]
): string {
  return (
    `❌ File type not allowed: ${fileName}\n` +
    `📎 Extension: ${extension}\n` +
    `✅ Allowed types: ${allowed.join(', ')}\n\n` +
    '💡 Please convert your file to an allowed format or contact the administrator to add this file type.'
  );
}

export function sizeRejectedText(fileName: string, size: number, maxSize: number): string {
  return (
    `❌ File too large: ${fileName}\n` +
    `📊 Size: ${formatBytes(size)}\n` +
    `🚫 Maximum limit: ${formatBytes(maxSize)}\n\n` +
    '💡 Files larger than the configured limit are not accepted.'
  );
}

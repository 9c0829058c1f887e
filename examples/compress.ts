/**
 * Example: Compress and decompress text with Huffman coding.
 *
 * Usage:
 *   npx tsx examples/compress.ts
 *
 *   Or with custom text:
 *      npx tsx examples/compress.ts "Your text here"
 *
 *   Or with a file, writing the container next to it:
 *      npx tsx examples/compress.ts --file notes.txt --out notes.txt.huf
 *
 *   Or decode a container written earlier:
 *      npx tsx examples/compress.ts --decode notes.txt.huf
 */

import * as fs from 'fs';
import { HuffmanCompressor, codeToString } from '../src/index.js';

interface Options {
  text: string;
  out: string | null;
  decode: string | null;
  showCodes: number;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  const options: Options = {
    text: `The quick brown fox jumps over the lazy dog.
This is a test of Huffman text compression.
Frequent characters get short codes, rare ones get long codes.`,
    out: null,
    decode: null,
    showCodes: 12,
  };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--file' && args[i + 1]) {
      options.text = fs.readFileSync(args[++i], 'utf8');
    } else if (args[i] === '--out' && args[i + 1]) {
      options.out = args[++i];
    } else if (args[i] === '--decode' && args[i + 1]) {
      options.decode = args[++i];
    } else if (args[i] === '--codes' && args[i + 1]) {
      options.showCodes = parseInt(args[++i], 10);
    } else if (!args[i].startsWith('--')) {
      options.text = args[i];
    }
  }

  return options;
}

function runDecode(compressor: HuffmanCompressor, file: string) {
  const data = new Uint8Array(fs.readFileSync(file));
  console.log(`📤 Decompressing ${file} (${data.length} bytes)...`);

  const text = compressor.decompressText(data);
  console.log('─'.repeat(50));
  console.log(text.length > 500 ? text.slice(0, 500) + '...' : text);
  console.log('─'.repeat(50));
}

function runRoundTrip(compressor: HuffmanCompressor, options: Options) {
  const { text } = options;

  console.log('📝 Original text:');
  console.log('─'.repeat(50));
  console.log(text.length > 500 ? text.slice(0, 500) + '...' : text);
  console.log('─'.repeat(50));
  console.log(`  (${text.length} characters)`);
  console.log();

  // Compress
  console.log('🗜️  Compressing...');
  const startCompress = Date.now();
  const result = compressor.compress(text);
  const compressTime = Date.now() - startCompress;
  const report = compressor.analyze(text);

  console.log('📊 Compression results:');
  console.log(`  Symbols:           ${result.symbolCount}`);
  console.log(`  Distinct symbols:  ${result.codebook.size}`);
  console.log(`  Payload bits:      ${result.stats.compressedBits} (vs ${result.stats.originalBits})`);
  console.log(`  Space savings:     ${result.stats.spaceSavings.toFixed(1)}%`);
  console.log(`  Container size:    ${result.compressedSize} bytes`);
  console.log(`  Compression ratio: ${result.compressionRatio.toFixed(2)}x`);
  console.log(`  Entropy:           ${report.entropy.toFixed(3)} bits/symbol`);
  console.log(`  Average code:      ${report.averageBitsPerSymbol.toFixed(3)} bits/symbol`);
  console.log(`  Efficiency:        ${(report.efficiency * 100).toFixed(1)}%`);
  console.log(`  Compression time:  ${compressTime}ms`);
  console.log();

  // Shortest codes first
  const codes = [...result.codebook.entries()].sort(
    (a, b) => a[1].length - b[1].length || a[0] - b[0]
  );
  console.log(`🔤 Codebook (${Math.min(options.showCodes, codes.length)} of ${codes.length}):`);
  for (const [symbol, code] of codes.slice(0, options.showCodes)) {
    console.log(`  ${JSON.stringify(String.fromCodePoint(symbol)).padEnd(8)} ${codeToString(code)}`);
  }
  console.log();

  if (options.out) {
    fs.writeFileSync(options.out, result.data);
    console.log(`💾 Wrote ${result.data.length} bytes to ${options.out}`);
    console.log();
  }

  // Decompress
  const decompressed = compressor.decompressText(result.data);

  // Verify
  if (decompressed === text) {
    console.log('✅ Verification: PASSED (decompressed matches original)');
  } else {
    console.log('❌ Verification: FAILED (decompressed does not match original)');
    console.log('Original length:', text.length);
    console.log('Decompressed length:', decompressed.length);
    process.exitCode = 1;
  }
}

function main() {
  const options = parseArgs();
  const compressor = new HuffmanCompressor();

  if (options.decode) {
    runDecode(compressor, options.decode);
  } else {
    runRoundTrip(compressor, options);
  }
}

try {
  main();
} catch (err) {
  console.error('Error:', err);
  process.exit(1);
}

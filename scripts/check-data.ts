import { loadConfig } from '../src/config';
import { CrossReferenceIndex } from '../src/modules/cross-reference';
import { JsonDirectorySource, countRecords, loadSnapshot } from '../src/modules/record-store';
import { errorMessage } from '../src/utils';

/**
 * Load the data directory once and report what a refresh would see:
 * record counts, skipped records and unresolved cross-references.
 * Exits non-zero when the load fails.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  console.log(`🧪 Checking records in ${config.dataDir}...`);

  const source = new JsonDirectorySource(config.dataDir);
  const snapshot = await loadSnapshot(source, 1, { timeoutMs: config.loadTimeoutMs });
  const index = CrossReferenceIndex.build(snapshot);

  console.log('---------------------------------------------------');
  for (const [type, count] of Object.entries(countRecords(snapshot))) {
    console.log(`${type.padEnd(12)} ${count}`);
  }
  console.log('---------------------------------------------------');

  for (const diagnostic of snapshot.diagnostics) {
    const position = diagnostic.recordIndex === undefined ? '' : `#${diagnostic.recordIndex}`;
    console.log(`⚠️  [${diagnostic.category}${position}] ${diagnostic.message}`);
  }
  for (const issue of index.issues) {
    console.log(`🔗 ${issue.from.type} ${issue.from.id}: ${issue.kind} "${issue.reference}"`);
  }

  if (snapshot.diagnostics.length === 0 && index.issues.length === 0) {
    console.log('🎉 All records loaded and every reference resolves.');
  }
}

main().catch((error) => {
  console.error('❌ CHECK FAILED:', errorMessage(error));
  process.exit(1);
});

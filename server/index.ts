/**
 * Asset Engine Entry Point
 * Runs the lifecycle engine against the configured output directories and
 * logs the events a presentation layer would receive.
 */

import path from 'path';
import { loadConfig } from './config/index.js';
import { AssetEngine } from './services/AssetEngine.js';

async function startup(): Promise<AssetEngine> {
  console.log('╔═════════════════════════════════════════╗');
  console.log('║       Asset Engine Starting...          ║');
  console.log('╚═════════════════════════════════════════╝');

  const config = loadConfig({ file: process.argv[2] });
  const engine = new AssetEngine(config);

  engine.subscribe({
    onAssetDiscovered: (asset, isSessionScoped) => {
      const scope = isSessionScoped ? 'session' : 'historical';
      console.log(`[Engine] + ${asset.kind} (${scope}): ${path.relative(config.rootDir, asset.path)}`);
    },
    onAssetRemoved: assetPath => {
      console.log(`[Engine] - ${path.relative(config.rootDir, assetPath)}`);
    },
    onAssociationChanged: (image, model) => {
      const target = model ? path.relative(config.rootDir, model) : '(none)';
      console.log(`[Engine] ${path.relative(config.rootDir, image)} → ${target}`);
    },
    onSelectionChanged: objects => {
      const summary = engine.getSelectionSummary();
      console.log(
        `[Engine] Selection: ${objects.length} objects ` +
        `(image-only ${summary['image-only']}, has-model ${summary['has-model']}, textured ${summary.textured})`
      );
    },
  });

  await engine.start();

  console.log('');
  console.log(`[Engine] Root: ${config.rootDir}`);
  console.log(`[Engine] State: ${config.statePath}`);
  for (const directory of config.directories) {
    console.log(`[Engine] Watching ${directory.name} (${directory.kind}): ${directory.path}`);
  }
  console.log(`[Engine] Views: ${engine.getViewNames().join(', ')}`);
  console.log('');

  return engine;
}

function shutdown(engine: AssetEngine): void {
  let stopping = false;
  const handler = (): void => {
    if (stopping) return;
    stopping = true;
    console.log('\n[Engine] Shutting down...');
    engine.stop()
      .then(() => process.exit(0))
      .catch(err => {
        console.error('[Engine] Shutdown failed:', err);
        process.exit(1);
      });
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

startup()
  .then(shutdown)
  .catch(err => {
    console.error('[Engine] Failed to start:', err);
    process.exit(1);
  });

#!/usr/bin/env node
/**
 * Adds the design of one slide to the layout catalog as a new style.
 */

import * as fs from 'node:fs/promises';
import { ComponentsManager, Presentation, createLogger } from '../src/index.js';

const USAGE =
  'Usage: slidesmith-add-style <deck.pptx> <slide-number> <layout> <style-name> <catalog.json> [--picture-dir=DIR]';

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const positional = args.filter((arg) => !arg.startsWith('--'));
  const [deckPath, slideArg, layoutName, styleName, catalogPath] = positional;
  const slideNumber = Number(slideArg);

  if (!deckPath || !layoutName || !styleName || !catalogPath || !Number.isInteger(slideNumber) || slideNumber < 1) {
    console.error(USAGE);
    process.exit(1);
  }
  const pictureDir = args.find((arg) => arg.startsWith('--picture-dir='))?.slice('--picture-dir='.length);

  const logger = createLogger('info', 'add-style');
  const catalog = new ComponentsManager({ logger });
  if (await fileExists(catalogPath)) {
    await catalog.load(catalogPath);
  }
  catalog.addLayout(layoutName);

  const presentation = await Presentation.open(deckPath, logger.child('Presentation'));
  const style = await catalog.addStyleFromSlide(presentation.getSlide(slideNumber - 1), layoutName, styleName, {
    pictureDir,
  });
  await catalog.save(catalogPath);

  console.log(`Added style '${style.name}' to '${layoutName}' with ${style.size} shapes`);
  for (const [name, shape] of style.sortedShapes()) {
    console.log(`  ${name}: ${shape.contentType ?? 'decoration'} x${shape.locations.length}`);
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});

#!/usr/bin/env node
import 'source-map-support/register';
import { runPreviewComment } from '../lib/preview/cli';

// Run with: npm run preview:comment
runPreviewComment(process.argv.slice(2)).then(code => {
  process.exitCode = code;
});

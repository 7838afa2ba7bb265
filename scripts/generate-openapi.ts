import { createTestApp } from '../packages/api/src/test-helpers.js';

const { app } = createTestApp();

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Tenet API',
    version: '1.0.0',
    description: 'Coherence evaluation and commit of agent guidelines and style guides',
  },
  servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');

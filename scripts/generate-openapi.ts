import fs from 'fs';
import path from 'path';
import { swaggerSpec } from '../src/swagger/swagger.config';

/**
 * Write the OpenAPI document to dist/openapi.json
 */
const outputPath = path.join(process.cwd(), 'dist', 'openapi.json');

fs.mkdirSync(path.dirname(outputPath), { recursive: true });
fs.writeFileSync(outputPath, JSON.stringify(swaggerSpec, null, 2));

const paths: unknown = 'paths' in swaggerSpec ? swaggerSpec['paths'] : undefined;
const endpointCount = paths && typeof paths === 'object' ? Object.keys(paths).length : 0;

console.log(`✅ OpenAPI spec generated: ${outputPath}`);
console.log(`   Endpoints found: ${endpointCount}`);

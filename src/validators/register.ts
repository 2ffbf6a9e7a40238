/**
 * Registers the built-in extractors.
 * Import this module to ensure extractors are available before use.
 */

import { extractorRegistry } from './extractor-registry.js';
import { PythonExtractor } from './python.js';
import { XmlExtractor } from './xml.js';
import { CsvExtractor } from './csv.js';
import { PoExtractor } from './po.js';
import { ManifestExtractor } from './manifest.js';

extractorRegistry.register('python', () => new PythonExtractor(), ['.py']);
extractorRegistry.register('xml', () => new XmlExtractor(), ['.xml']);
extractorRegistry.register('csv', () => new CsvExtractor(), ['.csv']);
extractorRegistry.register('po', () => new PoExtractor(), ['.po', '.pot']);
extractorRegistry.register('manifest', () => new ManifestExtractor(), []);

#!/usr/bin/env node

/**
 * attack-workbook CLI — ATT&CK techniques between Excel and the Navigator
 *
 * Usage:
 *   attack-workbook seed techniques.xlsx --domain enterprise-attack --platformfilterin Windows
 *   attack-workbook layer techniques.xlsx layer.json --worksheet techniques --name "Control gaps"
 */

import 'dotenv/config';

import { main } from './program.js';

await main(process.argv);

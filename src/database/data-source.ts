// src/database/data-source.ts
// Entry point for the TypeORM CLI (migration:run / migration:revert).
import 'reflect-metadata';
import 'dotenv/config';

import { DataSource } from 'typeorm';
import { loadAppConfig } from '../config/app.config.js';
import { sqliteOptions } from './sqlite-options.js';

const dataSource = new DataSource(sqliteOptions(loadAppConfig()));

export default dataSource;

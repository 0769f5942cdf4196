// Nest decorators read and write design-time metadata
import 'reflect-metadata';

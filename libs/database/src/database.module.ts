import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from './entities';

/**
 * DatabaseModule — registers all TypeORM entity repositories.
 *
 * Imported by both api-gateway and worker feature modules.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class SomeFeatureModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  /**
   * Registers all entity repositories for injection.
   * Uses TypeOrmModule.forFeature under the hood.
   */
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      exports: [TypeOrmModule],
    };
  }

  /**
   * Returns the array of all entity classes.
   * Useful for passing to TypeOrmModule.forRoot({ entities }).
   */
  static get entities(): typeof ENTITIES {
    return ENTITIES;
  }
}

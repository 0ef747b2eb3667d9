/**
 * Redis module types and interfaces
 */

export interface RedisConfig {
  redisHost: string;
  redisPort: number;
  redisPassword?: string;
  redisDb: number;
  /**
   * Connection attempts before giving up
   */
  maxRetries: number;
}

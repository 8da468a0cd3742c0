import type { Enemy, Obstacle, Player, Projectile } from './entities';
import type { SimSettings } from './settings';

export function stepPlayer(player: Player, settings: SimSettings): void {
  player.velocity = Math.min(player.velocity + settings.player.gravity, settings.player.maxVelocity);
  player.y += player.velocity;
}

export function flap(player: Player, settings: SimSettings): void {
  player.velocity = settings.player.flapStrength;
}

export function stepObstacle(obstacle: Obstacle): void {
  obstacle.x -= obstacle.speed;
}

export function stepEnemy(enemy: Enemy, settings: SimSettings): void {
  enemy.x -= enemy.speed;
  enemy.phase += settings.enemies.phaseStep;
  enemy.y = enemy.baseY + enemy.amplitude * Math.sin(enemy.phase);
}

export function stepProjectile(projectile: Projectile): void {
  projectile.x += projectile.speed;
}

export interface MovingEntities {
  player: Player;
  obstacles: Obstacle[];
  enemies: Enemy[];
  projectiles: Projectile[];
}

export function advanceEntities(world: MovingEntities, settings: SimSettings): void {
  stepPlayer(world.player, settings);
  world.obstacles.forEach(stepObstacle);
  world.enemies.forEach((enemy) => stepEnemy(enemy, settings));
  world.projectiles.forEach(stepProjectile);
}

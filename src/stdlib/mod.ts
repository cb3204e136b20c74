import { BuiltinRegistry } from "../builtins.js";
import { registerCore } from "./core.js";
import { registerMath } from "./math.js";
import { PhysicsCollaborator, registerPhysics } from "./physics.js";

export { PhysicsCollaborator } from "./physics.js";

export interface StandardLibrary {
  registry: BuiltinRegistry;
  physics: PhysicsCollaborator;
}

/** A fresh registry holding the core, math and physics modules. */
export function createStandardLibrary(): StandardLibrary {
  const registry = new BuiltinRegistry();
  registerCore(registry);
  registerMath(registry);
  const physics = registerPhysics(registry, new PhysicsCollaborator());
  return { registry, physics };
}

import { type BuiltinRegistry, forall } from "../builtins.js";
import { arrayType, FLOAT, funcType, INT, STRING, type Type, UNIT } from "../types.js";
import {
  arrayValue,
  type CallContext,
  describeValueKind,
  floatValue,
  type HandleValue,
  intValue,
  type RuntimeValue,
  stringValue,
  UNIT_VALUE,
} from "../value.js";
import { argumentMismatchError, invalidOperationError } from "../error.js";
import { expectInt, expectNumber, expectString, expectVector } from "./args.js";

export type Vec3 = [number, number, number];

export const SHAPES = ["sphere", "box", "cylinder", "capsule"] as const;
export type Shape = typeof SHAPES[number];

export const GRAVITY: Vec3 = [0, -9.81, 0];
export const TIME_STEP = 1 / 60;
export const GROUND_BOUNCE = 0.8;

export interface RigidBody {
  id: number;
  shape: Shape;
  mass: number;
  position: Vec3;
  velocity: Vec3;
}

interface World {
  id: number;
  bodies: Map<number, RigidBody>;
  nextBodyId: number;
  time: number;
}

const PHYSICS_WORLD: Type = { kind: "opaque", name: "PhysicsWorld" };
const OWNER = "physics";

function isShape(name: string): name is Shape {
  return SHAPES.some((shape) => shape === name);
}

/**
 * In-process rigid body simulation. Scripts never see its objects, only
 * integer handles to worlds and integer body ids inside a world.
 */
export class PhysicsCollaborator {
  private readonly worlds = new Map<number, World>();
  private nextWorldId = 1;

  createWorld(): number {
    const id = this.nextWorldId++;
    this.worlds.set(id, { id, bodies: new Map(), nextBodyId: 1, time: 0 });
    return id;
  }

  addRigidBody(worldId: number, shape: string, mass: number, position: Vec3): number {
    const world = this.world(worldId);
    if (!isShape(shape)) {
      throw invalidOperationError(
        `unknown shape '${shape}', expected one of ${SHAPES.join(", ")}`,
      );
    }
    if (mass < 0) {
      throw invalidOperationError(`mass must not be negative, got ${mass}`);
    }
    const id = world.nextBodyId++;
    world.bodies.set(id, { id, shape, mass, position: [...position], velocity: [0, 0, 0] });
    return id;
  }

  // Semi-implicit Euler; bodies with zero mass stay put
  step(worldId: number): void {
    const world = this.world(worldId);
    for (const body of world.bodies.values()) {
      if (body.mass === 0) {
        continue;
      }
      for (let axis = 0; axis < 3; axis++) {
        body.velocity[axis] += GRAVITY[axis] * TIME_STEP;
        body.position[axis] += body.velocity[axis] * TIME_STEP;
      }
      if (body.position[1] < 0) {
        body.position[1] = 0;
        body.velocity[1] = -body.velocity[1] * GROUND_BOUNCE;
      }
    }
    world.time += TIME_STEP;
  }

  body(worldId: number, bodyId: number): RigidBody {
    const body = this.world(worldId).bodies.get(bodyId);
    if (!body) {
      throw invalidOperationError(`no object ${bodyId} in physics world ${worldId}`);
    }
    return body;
  }

  setMass(worldId: number, bodyId: number, mass: number): void {
    if (mass < 0) {
      throw invalidOperationError(`mass must not be negative, got ${mass}`);
    }
    this.body(worldId, bodyId).mass = mass;
  }

  objectIds(worldId: number): number[] {
    return [...this.world(worldId).bodies.keys()];
  }

  time(worldId: number): number {
    return this.world(worldId).time;
  }

  private world(id: number): World {
    const world = this.worlds.get(id);
    if (!world) {
      throw invalidOperationError(`unknown physics world ${id}`);
    }
    return world;
  }
}

function worldId(call: CallContext, value: RuntimeValue): number {
  if (value.kind === "handle" && value.owner === OWNER) {
    return value.id;
  }
  throw argumentMismatchError(call.name, "PhysicsWorld", describeValueKind(value), call.span);
}

export function registerPhysics(
  registry: BuiltinRegistry,
  physics: PhysicsCollaborator = new PhysicsCollaborator(),
): PhysicsCollaborator {
  const module = { module: "physics" };

  registry.register(
    "create_physics_world",
    forall(funcType([], PHYSICS_WORLD)),
    (): HandleValue => ({ kind: "handle", owner: OWNER, id: physics.createWorld() }),
    module,
  );

  registry.register(
    "add_rigid_body",
    forall(funcType([PHYSICS_WORLD, STRING, FLOAT, arrayType(FLOAT)], INT)),
    ([world, shape, mass, position], call) => {
      const [x, y, z] = expectVector(call, position, 3);
      return intValue(
        physics.addRigidBody(
          worldId(call, world),
          expectString(call, shape),
          expectNumber(call, mass),
          [x, y, z],
        ),
      );
    },
    module,
  );

  registry.register(
    "physics_step",
    forall(funcType([PHYSICS_WORLD], UNIT)),
    ([world], call) => {
      physics.step(worldId(call, world));
      return UNIT_VALUE;
    },
    module,
  );

  registry.register(
    "get_object_position",
    forall(funcType([PHYSICS_WORLD, INT], arrayType(FLOAT))),
    ([world, id], call) => {
      const body = physics.body(worldId(call, world), expectInt(call, id));
      return arrayValue(body.position.map(floatValue));
    },
    module,
  );

  registry.register(
    "get_object_mass",
    forall(funcType([PHYSICS_WORLD, INT], FLOAT)),
    ([world, id], call) => floatValue(physics.body(worldId(call, world), expectInt(call, id)).mass),
    module,
  );

  registry.register(
    "set_object_mass",
    forall(funcType([PHYSICS_WORLD, INT, FLOAT], UNIT)),
    ([world, id, mass], call) => {
      physics.setMass(worldId(call, world), expectInt(call, id), expectNumber(call, mass));
      return UNIT_VALUE;
    },
    module,
  );

  registry.register(
    "get_object_shape",
    forall(funcType([PHYSICS_WORLD, INT], STRING)),
    ([world, id], call) =>
      stringValue(physics.body(worldId(call, world), expectInt(call, id)).shape),
    module,
  );

  registry.register(
    "list_objects",
    forall(funcType([PHYSICS_WORLD], arrayType(INT))),
    ([world], call) => arrayValue(physics.objectIds(worldId(call, world)).map((id) => intValue(id))),
    module,
  );

  registry.register(
    "world_time",
    forall(funcType([PHYSICS_WORLD], FLOAT)),
    ([world], call) => floatValue(physics.time(worldId(call, world))),
    module,
  );

  return physics;
}

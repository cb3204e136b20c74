import { describe, expect, test } from "vitest";
import { GROUND_BOUNCE, PhysicsCollaborator, TIME_STEP } from "../src/stdlib/physics.js";
import { runFile } from "../src/runner.js";

describe("PhysicsCollaborator", () => {
  test("hands out sequential world and body ids", () => {
    const physics = new PhysicsCollaborator();
    const world = physics.createWorld();
    expect(world).toBe(1);
    expect(physics.createWorld()).toBe(2);
    expect(physics.addRigidBody(world, "sphere", 1, [0, 5, 0])).toBe(1);
    expect(physics.addRigidBody(world, "box", 1, [0, 5, 0])).toBe(2);
    expect(physics.objectIds(world)).toEqual([1, 2]);
  });

  test("a step applies gravity then moves the body", () => {
    const physics = new PhysicsCollaborator();
    const world = physics.createWorld();
    const id = physics.addRigidBody(world, "sphere", 1, [0, 5, 0]);
    physics.step(world);
    const body = physics.body(world, id);
    expect(body.velocity[1]).toBeCloseTo(-0.1635, 10);
    expect(body.position[1]).toBeCloseTo(4.997275, 10);
    expect(body.position[0]).toBe(0);
    expect(physics.time(world)).toBeCloseTo(TIME_STEP, 12);
  });

  test("massless bodies stay put", () => {
    const physics = new PhysicsCollaborator();
    const world = physics.createWorld();
    const id = physics.addRigidBody(world, "box", 0, [1, 2, 3]);
    physics.step(world);
    physics.step(world);
    expect(physics.body(world, id).position).toEqual([1, 2, 3]);
    expect(physics.time(world)).toBeCloseTo(2 * TIME_STEP, 12);
  });

  test("bodies bounce off the ground", () => {
    const physics = new PhysicsCollaborator();
    const world = physics.createWorld();
    const id = physics.addRigidBody(world, "capsule", 1, [0, 0, 0]);
    physics.step(world);
    const body = physics.body(world, id);
    expect(body.position[1]).toBe(0);
    expect(body.velocity[1]).toBeCloseTo(0.1635 * GROUND_BOUNCE, 10);
  });

  test("rejects bad shapes, masses and ids", () => {
    const physics = new PhysicsCollaborator();
    const world = physics.createWorld();
    expect(() => physics.addRigidBody(world, "cone", 1, [0, 0, 0])).toThrow(
      "unknown shape 'cone', expected one of sphere, box, cylinder, capsule",
    );
    expect(() => physics.addRigidBody(world, "box", -1, [0, 0, 0])).toThrow(
      "mass must not be negative, got -1",
    );
    expect(() => physics.step(99)).toThrow("unknown physics world 99");
    expect(() => physics.body(world, 5)).toThrow("no object 5 in physics world 1");
  });
});

describe("physics builtins", () => {
  const setup = [
    "let w = create_physics_world()",
    'let ball = add_rigid_body(w, "sphere", 2.0, [0.0, 10.0, 0.0])',
  ].join("\n");

  test("scripts read back what they created", () => {
    expect(runFile(`${setup}\nget_object_shape(w, ball)`).result).toBe("sphere");
    expect(runFile(`${setup}\nget_object_mass(w, ball)`).result).toBe("2.0");
    expect(runFile(`${setup}\nlist_objects(w)`).result).toBe("[1]");
    expect(runFile(`${setup}\nset_object_mass(w, ball, 3.5)\nget_object_mass(w, ball)`).result)
      .toBe("3.5");
  });

  test("stepping moves bodies down", () => {
    const result = runFile(`${setup}\nphysics_step(w)\nget_object_position(w, ball)[1] < 10.0`);
    expect(result.result).toBe("true");
  });

  test("errors name the builtin", () => {
    expect(() => runFile(`${setup}\nadd_rigid_body(w, "cone", 1.0, [0.0, 0.0, 0.0])`)).toThrow(
      "unknown shape 'cone'",
    );
    expect(() => runFile(`${setup}\nadd_rigid_body(w, "box", 1.0, [0.0, 1.0])`)).toThrow(
      "Argument mismatch: expected an array of 3 numbers, got an array of 2",
    );
  });
});

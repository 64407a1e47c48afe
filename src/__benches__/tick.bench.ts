import { bench, describe } from "vitest";
import { AppBuilder } from "../app_builder";
import { component } from "../component";
import { Query } from "../query";
import { STAGE } from "../stage";

class Elapsed {
  ticks = 0;
}

function moving_app(entity_count: number) {
  const builder = AppBuilder.create();
  const Position = builder.register_component<{ x: number; y: number }>("Position");
  const Velocity = builder.register_component<{ x: number; y: number }>("Velocity");
  const movers = Query.with(Position, Velocity);

  return builder
    .init_resource(Elapsed)
    .add_startup_system((ctx) => {
      for (let i = 0; i < entity_count; i++) {
        ctx.spawn(
          component(Position, { x: i, y: 0 }),
          component(Velocity, { x: 1, y: 0.5 }),
        );
      }
    })
    .add_system({
      name: "movement",
      queries: [movers],
      fn: () =>
        movers.each((_e, pos, vel) => {
          pos.x += vel.x;
          pos.y += vel.y;
        }),
    })
    .add_system_to_stage(STAGE.LAST, (ctx) => {
      ctx.resource(Elapsed).ticks++;
    })
    .build();
}

describe("tick", () => {
  const small = moving_app(1_000);
  const large = moving_app(50_000);

  bench("1k movers", () => {
    small.tick();
  });

  bench("50k movers", () => {
    large.tick();
  });

  bench("spawn + despawn churn", () => {
    const app = AppBuilder.create()
      .add_system((ctx) => {
        const e = ctx.spawn();
        ctx.despawn(e);
      })
      .build();
    for (let i = 0; i < 100; i++) app.tick();
  });
});

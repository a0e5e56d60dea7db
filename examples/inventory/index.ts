import { tmpdir } from "node:os";
import { join } from "node:path";
import { Loader, Types, defineSchema } from "../../src";

export namespace Schemas {
    export const Item = defineSchema(
        class Item {
            name = "";
            count = 0;
            weight = 0;
        },
        {
            fields: { name: Types.str, count: Types.int, weight: Types.float },
            // Keep the wire token of `count` stable if fields are reordered
            aliases: { count: 10 },
        }
    );

    export type Item = InstanceType<typeof Item>;

    export const Inventory = defineSchema(
        class Inventory {
            owner = "";
            items: Item[] = [];
            tags = new Set<string>();
        },
        { fields: { owner: Types.str, items: Types.list, tags: Types.set } }
    );

    export type Inventory = InstanceType<typeof Inventory>;
}

function item(name: string, count: number, weight: number): Schemas.Item {
    const result = new Schemas.Item();
    result.name = name;
    result.count = count;
    result.weight = weight;
    return result;
}

async function main(): Promise<void> {
    const loader = new Loader({ debug: true });

    const inventory = new Schemas.Inventory();
    inventory.owner = "player-1";
    inventory.items = [item("rope", 1, 2.5), item("torch", 3, 0.75)];
    inventory.tags = new Set(["starter"]);

    const path = join(tmpdir(), "inventory.bin");
    await loader.write(path, inventory, { tagging: true });

    const restored = await loader.read(path, Schemas.Inventory, { tagging: true });
    for (const entry of restored.items) {
        if (entry instanceof Schemas.Item) {
            console.log(`${restored.owner}: ${entry.count} x ${entry.name} (${entry.weight} kg)`);
        }
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});

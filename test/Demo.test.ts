import { Store } from "../src";
import { runDemo } from "../example/main";

describe("demo", () => {
    it("prints the entity after each step", () => {
        const lines: string[] = [];
        const store = new Store();

        runDemo(store, (line) => lines.push(line));

        expect(lines).toEqual([
            "Entity #1 { position: { x: Float(0.0), y: Float(0.0) } }",
            "Entity #1 { position: { x: Float(0.0), y: Float(0.0) } }",
            "Entity #1 { position: { x: Float(1.0), y: Float(0.0) } }",
            "Entity #1 { position: { x: Float(2.0), y: Float(0.0) } }",
            "Entity #1 { position: { x: Float(2.0), y: Float(0.0) } }\nEntity #2 {}"
        ]);
        expect(store.entityIds()).toEqual([1, 2]);
    });
});

import { expect } from "chai";
import { Dependency, requiredDependenciesMet } from "../../src/model/Dependency";
import { ConfigurationError } from "../../src/model/error/ConfigurationError";

describe("Dependency", () => {

    it("should be met once and ignore later notifications", () => {

        const dependency = new Dependency({ contextKey: "summary" });

        expect(dependency.markMet("first")).to.equal(true);
        expect(dependency.markMet("second")).to.equal(false);

        expect(dependency.isMet).to.equal(true);
        expect(dependency.output).to.equal("first");
    });

    it("should extract the value at its property path", () => {

        const dependency = new Dependency({ contextKey: "report", propertyPath: "sections.1.title" });

        dependency.markMet({ sections: [{ title: "Intro" }, { title: "Findings" }] });

        expect(dependency.output).to.equal("Findings");
    });

    it("should default the property name to the context key and be required", () => {

        const dependency = new Dependency({ contextKey: "summary" });

        expect(dependency.propertyName).to.equal("summary");
        expect(dependency.required).to.equal(true);
    });

    it("should go back to unmet on reset", () => {

        const dependency = new Dependency({ contextKey: "summary" });

        dependency.markMet("value");
        dependency.reset();

        expect(dependency.isMet).to.equal(false);
        expect(dependency.output).to.be.null;
    });

    it("should not wait for optional dependencies", () => {

        const required = new Dependency({ contextKey: "a" });
        const optional = new Dependency({ contextKey: "b", required: false });

        expect(requiredDependenciesMet([required, optional])).to.equal(false);

        required.markMet(1);

        expect(requiredDependenciesMet([required, optional])).to.equal(true);
    });

    it("should parse names and objects", () => {

        expect(Dependency.fromJSON("summary").contextKey).to.equal("summary");

        const parsed = Dependency.fromJSON({ contextKey: "report", propertyName: "title", propertyPath: "title", required: false, isMet: true, output: { title: "Hello" } });

        expect(parsed.toJSON()).to.deep.equal({ contextKey: "report", propertyName: "title", propertyPath: "title", required: false, output: "Hello", isMet: true });
    });

    it("should reject empty names", () => {

        expect(() => Dependency.fromJSON(" ")).to.throw(ConfigurationError);
        expect(() => Dependency.fromJSON({ propertyName: "x" })).to.throw(ConfigurationError);
    });
});

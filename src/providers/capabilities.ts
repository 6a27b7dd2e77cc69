/**
 * Model capability flags.
 *
 * A model's capability set is a bitmask; a request's required capability is
 * satisfied when every required bit is present in the model's set.
 */
export enum AICapability {
	None = 0,
	TextInput = 1 << 0,
	ImageInput = 1 << 1,
	AudioInput = 1 << 2,
	JsonInput = 1 << 3,
	TextOutput = 1 << 4,
	ImageOutput = 1 << 5,
	AudioOutput = 1 << 6,
	JsonOutput = 1 << 7,
	FunctionCalling = 1 << 8,
	Reasoning = 1 << 9,

	Text2Text = TextInput | TextOutput,
	BasicChat = Text2Text,
	ToolChat = Text2Text | FunctionCalling,
	ReasoningChat = Text2Text | Reasoning,
	ToolReasoningChat = ToolChat | Reasoning,
	Text2Json = TextInput | JsonOutput,
	Text2Image = TextInput | ImageOutput,
	Image2Image = ImageInput | ImageOutput,
	Text2Speech = TextInput | AudioOutput,
	Speech2Text = AudioInput | TextOutput,
	Image2Text = ImageInput | TextOutput,
}

/** Single-bit flags in declaration order, used for rendering and parsing. */
export const CAPABILITY_FLAGS: ReadonlyArray<readonly [string, AICapability]> = [
	["TextInput", AICapability.TextInput],
	["ImageInput", AICapability.ImageInput],
	["AudioInput", AICapability.AudioInput],
	["JsonInput", AICapability.JsonInput],
	["TextOutput", AICapability.TextOutput],
	["ImageOutput", AICapability.ImageOutput],
	["AudioOutput", AICapability.AudioOutput],
	["JsonOutput", AICapability.JsonOutput],
	["FunctionCalling", AICapability.FunctionCalling],
	["Reasoning", AICapability.Reasoning],
];

export function hasCapability(capabilities: AICapability, required: AICapability): boolean {
	return (capabilities & required) === required;
}

/**
 * @example
 * capabilityToString(AICapability.ToolChat) // "TextInput, TextOutput, FunctionCalling"
 */
export function capabilityToString(capabilities: AICapability): string {
	if (capabilities === AICapability.None) return "None";

	const names = CAPABILITY_FLAGS.filter(([, flag]) => hasCapability(capabilities, flag)).map(([name]) => name);
	return names.join(", ");
}

/**
 * Resolve the default-for capabilities of a model from a provider's defaults map.
 *
 * First match, not best match: entries are visited in the map's insertion order.
 * 1. exact key
 * 2. the name is a pattern (`gpt-4*`): first key starting with its prefix
 * 3. first wildcard key whose prefix the name starts with
 * 4. `None`
 */
export function findDefaultCapabilityForModel(
	modelName: string,
	defaults: ReadonlyMap<string, AICapability>,
): AICapability {
	const exact = defaults.get(modelName);
	if (exact !== undefined) return exact;

	if (modelName.includes("*")) {
		const prefix = modelName.replaceAll("*", "");
		for (const [key, value] of defaults) {
			if (key.startsWith(prefix)) return value;
		}
	}

	for (const [key, value] of defaults) {
		if (key.includes("*") && modelName.startsWith(key.replaceAll("*", ""))) {
			return value;
		}
	}

	return AICapability.None;
}

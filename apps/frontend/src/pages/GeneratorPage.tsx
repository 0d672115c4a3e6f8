import { useEffect, useMemo, useRef, useState } from "react";
import { Link } from "react-router-dom";
import { useStore } from "zustand";
import { generationApi } from "../api/generation";
import { apiErrorMessage } from "../api/http";
import { ASSET_CATALOG, COLOR_COUNT_OPTIONS, findAssetType, type AssetIcon } from "../constants/assetCatalog";
import {
  allColorsSelected,
  canLeaveSubtypeSelection,
  composeSessionPrompt,
  promptTooLong,
  requiresColor
} from "../lib/generation-machine";
import { decodeBase64 } from "../lib/image-payload";
import { logger } from "../lib/logger";
import { MAX_PROMPT_LENGTH } from "../lib/prompt-composer";
import { loadEnhancedPrompt, loadPalette, loadSuggestions, randomFallbackPrompt } from "../lib/suggestions";
import { gemstoneLedger, useGemstoneStore } from "../stores/gemstone-store";
import { blockerMessages, createGenerationStore, type GenerationStore } from "../stores/generation-store";
import { useLibraryStore } from "../stores/library-store";
import type { GenerationStep, PaletteEntry } from "../types/models";

const steps: { step: GenerationStep; label: string }[] = [
  { step: "assetTypeSelection", label: "Type" },
  { step: "assetSubtypeSelection", label: "Style" },
  { step: "colorInput", label: "Colors" },
  { step: "promptInput", label: "Prompt" },
  { step: "generating", label: "Generate" },
  { step: "preview", label: "Preview" }
];

const iconGlyphs: Record<AssetIcon, string> = {
  person: "🧙",
  landscape: "🏞️",
  widgets: "🎛️",
  category: "🔷",
  texture: "🧱",
  star: "⭐",
  wallpaper: "🖼️",
  inventory: "🗡️"
};

const primaryButton =
  "rounded-full bg-[var(--brand-sand)] px-5 py-2 text-sm font-semibold text-[var(--ink-900)] transition hover:brightness-105 disabled:cursor-not-allowed disabled:opacity-50";
const secondaryButton =
  "rounded-full border border-white/30 px-5 py-2 text-sm font-semibold text-[var(--ink-100)] transition hover:bg-white/10 disabled:cursor-not-allowed disabled:opacity-50";
const choiceClass = (selected: boolean) =>
  `rounded-2xl border p-4 text-left transition ${
    selected
      ? "border-[var(--brand-sand)] bg-[var(--brand-sand)]/15"
      : "border-white/15 bg-black/20 hover:border-white/40"
  }`;

const paletteLabel = (entry: PaletteEntry) => entry.name ?? entry.hex ?? entry.rgb ?? entry.cmyk ?? "";

type StoreProps = {
  store: GenerationStore;
};

const StepIndicator = ({ current, showColors }: { current: GenerationStep; showColors: boolean }) => {
  const visible = steps.filter((item) => showColors || item.step !== "colorInput");
  const currentIndex = visible.findIndex((item) => item.step === current);

  return (
    <ol className="flex flex-wrap gap-2">
      {visible.map((item, index) => (
        <li
          key={item.step}
          className={`rounded-full px-3 py-1 text-xs font-semibold uppercase tracking-wider ${
            index === currentIndex
              ? "bg-[var(--brand-coral)] text-[var(--ink-900)]"
              : index < currentIndex
                ? "bg-white/15 text-[var(--ink-100)]"
                : "border border-white/15 text-[var(--ink-300)]"
          }`}
        >
          {item.label}
        </li>
      ))}
    </ol>
  );
};

const AssetTypeStep = ({ store }: StoreProps) => {
  const assetType = useStore(store, (state) => state.session.assetType);
  const selectAssetType = useStore(store, (state) => state.selectAssetType);

  return (
    <div className="grid gap-3 sm:grid-cols-2 lg:grid-cols-4">
      {ASSET_CATALOG.map((descriptor) => (
        <button
          key={descriptor.key}
          type="button"
          className={choiceClass(descriptor.label === assetType)}
          onClick={() => selectAssetType(descriptor.label)}
        >
          <span className="text-2xl" aria-hidden>
            {iconGlyphs[descriptor.icon]}
          </span>
          <p className="mt-2 font-display text-lg text-[var(--ink-100)]">{descriptor.label}</p>
          <p className="mt-1 text-xs text-[var(--ink-300)]">{descriptor.description}</p>
        </button>
      ))}
    </div>
  );
};

const SubtypeStep = ({ store }: StoreProps) => {
  const session = useStore(store, (state) => state.session);
  const selectSubtype = useStore(store, (state) => state.selectSubtype);
  const selectColorCount = useStore(store, (state) => state.selectColorCount);
  const continueFromSubtype = useStore(store, (state) => state.continueFromSubtype);
  const goBack = useStore(store, (state) => state.goBack);
  const descriptor = findAssetType(session.assetType);
  const colorRequired = requiresColor(session);

  return (
    <div className="space-y-6">
      <div className="grid gap-3 sm:grid-cols-2 lg:grid-cols-3">
        {descriptor?.subtypes.map((subtype) => (
          <button
            key={subtype.label}
            type="button"
            className={choiceClass(subtype.label === session.assetSubtype)}
            onClick={() => selectSubtype(subtype.label)}
          >
            <p className="font-semibold text-[var(--ink-100)]">{subtype.label}</p>
            {subtype.needsColor ? <p className="mt-1 text-xs text-[var(--ink-300)]">Pick your colors next</p> : null}
          </button>
        ))}
      </div>

      {colorRequired ? (
        <div>
          <p className="mb-2 text-xs uppercase tracking-wider text-[var(--ink-300)]">How many colors?</p>
          <div className="flex flex-wrap gap-2">
            {COLOR_COUNT_OPTIONS.map((count) => (
              <button
                key={count}
                type="button"
                className={`h-10 w-10 rounded-full text-sm font-semibold ${
                  session.colorCount === count
                    ? "bg-[var(--brand-sand)] text-[var(--ink-900)]"
                    : "border border-white/30 text-[var(--ink-100)]"
                }`}
                onClick={() => selectColorCount(count)}
              >
                {count}
              </button>
            ))}
          </div>
        </div>
      ) : null}

      <div className="flex gap-3">
        <button type="button" className={secondaryButton} onClick={goBack}>
          Back
        </button>
        <button
          type="button"
          className={primaryButton}
          disabled={!canLeaveSubtypeSelection(session)}
          onClick={continueFromSubtype}
        >
          Continue
        </button>
      </div>
    </div>
  );
};

const ColorStep = ({ store }: StoreProps) => {
  const session = useStore(store, (state) => state.session);
  const setColor = useStore(store, (state) => state.setColor);
  const continueFromColors = useStore(store, (state) => state.continueFromColors);
  const goBack = useStore(store, (state) => state.goBack);
  const [palette, setPalette] = useState<PaletteEntry[]>([]);
  const [loadingPalette, setLoadingPalette] = useState(false);

  const suggestPalette = async () => {
    setLoadingPalette(true);
    const context = [session.assetType, session.assetSubtype, session.prompt].filter(Boolean).join(" ");
    const result = await loadPalette(() =>
      generationApi.generatePalette({ context, count: Math.max(session.colorCount ?? 1, 3) })
    );
    setPalette(result.items);
    setLoadingPalette(false);
  };

  const applyPalette = () => {
    session.colors.forEach((_, index) => {
      const entry = palette[index % palette.length];
      if (entry) setColor(index, paletteLabel(entry));
    });
  };

  return (
    <div className="space-y-6">
      <div className="grid gap-3 sm:grid-cols-2">
        {session.colors.map((color, index) => (
          <label key={index} className="block">
            <span className="mb-1 block text-xs uppercase tracking-wider text-[var(--ink-300)]">Color {index + 1}</span>
            <input
              value={color}
              placeholder="e.g. Deep navy or #1B2A49"
              onChange={(event) => setColor(index, event.target.value)}
              className="w-full rounded-xl border border-white/20 bg-black/20 px-3 py-2 text-[var(--ink-100)] outline-none ring-[var(--brand-coral)]/60 transition focus:ring"
            />
          </label>
        ))}
      </div>

      <div className="rounded-2xl border border-white/15 bg-black/20 p-4">
        <div className="flex flex-wrap items-center gap-3">
          <button type="button" className={secondaryButton} disabled={loadingPalette} onClick={() => void suggestPalette()}>
            {loadingPalette ? "Mixing colors..." : "Suggest a palette"}
          </button>
          {palette.length > 0 ? (
            <button type="button" className={secondaryButton} onClick={applyPalette}>
              Use these colors
            </button>
          ) : null}
        </div>
        {palette.length > 0 ? (
          <div className="mt-4 flex flex-wrap gap-3">
            {palette.map((entry, index) => (
              <div key={`${paletteLabel(entry)}-${index}`} className="flex items-center gap-2 text-xs text-[var(--ink-200)]">
                <span
                  className="h-6 w-6 rounded-full border border-white/30"
                  style={{ background: entry.hex ?? entry.rgb ?? "transparent" }}
                />
                <span>{paletteLabel(entry)}</span>
                {entry.hex ? <span className="font-mono text-[var(--ink-300)]">{entry.hex}</span> : null}
              </div>
            ))}
          </div>
        ) : null}
      </div>

      <div className="flex gap-3">
        <button type="button" className={secondaryButton} onClick={goBack}>
          Back
        </button>
        <button
          type="button"
          className={primaryButton}
          disabled={!allColorsSelected(session)}
          onClick={continueFromColors}
        >
          Continue
        </button>
      </div>
    </div>
  );
};

const PromptStep = ({ store, aiAvailable }: StoreProps & { aiAvailable: boolean }) => {
  const session = useStore(store, (state) => state.session);
  const setPrompt = useStore(store, (state) => state.setPrompt);
  const submit = useStore(store, (state) => state.submit);
  const goBack = useStore(store, (state) => state.goBack);
  const balance = useGemstoneStore((state) => state.balance);
  const [suggestions, setSuggestions] = useState<string[]>([]);
  const [loadingSuggestions, setLoadingSuggestions] = useState(false);
  const [enhancing, setEnhancing] = useState(false);
  const category = session.assetType ?? "";
  const tooLong = promptTooLong(session);
  const composedLength = composeSessionPrompt(session).length;

  const enhance = async () => {
    setEnhancing(true);
    const result = await loadEnhancedPrompt(
      () =>
        generationApi.enhancePrompt({
          prompt: session.prompt.trim(),
          assetType: session.assetType ?? undefined,
          assetSubtype: session.assetSubtype ?? undefined
        }),
      session.prompt
    );
    setPrompt(result.prompt);
    setEnhancing(false);
  };

  const fetchSuggestions = async () => {
    setLoadingSuggestions(true);
    const result = await loadSuggestions(
      () => generationApi.getSuggestions({ category, style: session.assetSubtype ?? undefined, count: 5 }),
      category,
      session.assetSubtype
    );
    setSuggestions(result.items);
    setLoadingSuggestions(false);
  };

  return (
    <div className="space-y-5">
      <label className="block">
        <span className="mb-1 block text-xs uppercase tracking-wider text-[var(--ink-300)]">Describe your asset</span>
        <textarea
          rows={4}
          value={session.prompt}
          maxLength={MAX_PROMPT_LENGTH}
          onChange={(event) => setPrompt(event.target.value)}
          placeholder="A friendly fox adventurer with a lantern and a red scarf"
          className="w-full rounded-xl border border-white/20 bg-black/20 px-3 py-2 text-[var(--ink-100)] outline-none ring-[var(--brand-coral)]/60 transition focus:ring"
        />
        <span className={`mt-1 block text-right text-xs ${tooLong ? "text-[var(--brand-coral)]" : "text-[var(--ink-300)]"}`}>
          {composedLength} / {MAX_PROMPT_LENGTH}
        </span>
      </label>
      {tooLong ? <p className="text-sm text-[var(--brand-coral)]">{blockerMessages.prompt_too_long}</p> : null}

      <div className="flex flex-wrap gap-2">
        <button
          type="button"
          className={secondaryButton}
          disabled={enhancing || session.prompt.trim().length < 3}
          onClick={() => void enhance()}
        >
          {enhancing ? "Enhancing..." : "Enhance"}
        </button>
        <button
          type="button"
          className={secondaryButton}
          disabled={loadingSuggestions}
          onClick={() => void fetchSuggestions()}
        >
          {loadingSuggestions ? "Thinking..." : "Get ideas"}
        </button>
        <button
          type="button"
          className={secondaryButton}
          onClick={() => setPrompt(randomFallbackPrompt(category, session.assetSubtype))}
        >
          Surprise me
        </button>
      </div>

      {suggestions.length > 0 ? (
        <ul className="space-y-2">
          {suggestions.map((suggestion) => (
            <li key={suggestion}>
              <button
                type="button"
                onClick={() => setPrompt(suggestion)}
                className="w-full rounded-xl border border-white/15 bg-black/20 px-3 py-2 text-left text-sm text-[var(--ink-200)] transition hover:border-[var(--brand-sand)]"
              >
                {suggestion}
              </button>
            </li>
          ))}
        </ul>
      ) : null}

      {!aiAvailable ? (
        <p className="text-sm text-[var(--brand-coral)]">Image generation is currently unavailable.</p>
      ) : null}
      {session.error ? <p className="text-sm text-[var(--brand-coral)]">{session.error}</p> : null}

      <div className="flex flex-wrap items-center gap-3">
        <button type="button" className={secondaryButton} onClick={goBack}>
          Back
        </button>
        <button
          type="button"
          className={primaryButton}
          disabled={!session.prompt.trim() || tooLong || !aiAvailable || balance === 0}
          onClick={() => void submit()}
        >
          Generate (1 gemstone)
        </button>
        {balance === 0 ? <p className="text-xs text-[var(--ink-300)]">You are out of gemstones.</p> : null}
      </div>
    </div>
  );
};

const GeneratingStep = () => (
  <div className="grid min-h-[16rem] place-items-center">
    <div className="flex flex-col items-center gap-4">
      <div className="relative h-20 w-20">
        <div className="absolute inset-0 rounded-2xl border border-[var(--brand-sand)]/60 animate-pulse" />
        <div className="absolute inset-2 rounded-xl border border-[var(--brand-coral)]/80 animate-ping" />
        <div className="absolute inset-5 rounded-md bg-[var(--brand-sand)] animate-bounce" />
      </div>
      <p className="text-sm text-[var(--ink-200)]">Crafting your asset...</p>
    </div>
  </div>
);

const PreviewStep = ({ store }: StoreProps) => {
  const session = useStore(store, (state) => state.session);
  const generateAnother = useStore(store, (state) => state.generateAnother);
  const startOver = useStore(store, (state) => state.startOver);
  const saveAsset = useLibraryStore((state) => state.saveAsset);
  const [saveState, setSaveState] = useState<"idle" | "saving" | "saved">("idle");
  const [saveError, setSaveError] = useState<string | null>(null);
  const image = session.image;

  const objectUrl = useMemo(
    () =>
      image && image.status === "valid" ? URL.createObjectURL(new Blob([image.bytes.slice()], { type: image.mimeType })) : null,
    [image]
  );

  useEffect(() => {
    setSaveState("idle");
    setSaveError(null);
    return () => {
      if (objectUrl) URL.revokeObjectURL(objectUrl);
    };
  }, [objectUrl]);

  if (!image) return null;

  const onSave = async () => {
    setSaveState("saving");
    setSaveError(null);
    try {
      await saveAsset({ image, assetType: session.assetType, assetSubtype: session.assetSubtype });
      setSaveState("saved");
    } catch (error) {
      logger.warn("asset_save_failed", { error });
      setSaveError(apiErrorMessage(error, "Could not save the asset."));
      setSaveState("idle");
    }
  };

  return (
    <div className="grid gap-6 lg:grid-cols-[1fr_18rem]">
      <div className="grid min-h-[20rem] place-items-center rounded-2xl border border-white/15 bg-black/30 p-4">
        {objectUrl ? (
          <img src={objectUrl} alt={image.prompt} className="max-h-[32rem] rounded-xl object-contain" />
        ) : (
          <div className="max-w-sm text-center text-sm text-[var(--ink-200)]">
            <p className="font-display text-xl text-[var(--ink-100)]">Preview placeholder</p>
            <p className="mt-2">
              The generator returned a sample payload instead of a full image. Your gemstone was returned and this
              result cannot be saved.
            </p>
          </div>
        )}
      </div>

      <aside className="space-y-4">
        <div className="rounded-2xl border border-white/15 bg-black/20 p-4">
          <p className="text-xs uppercase tracking-wider text-[var(--ink-300)]">Prompt</p>
          <p className="mt-2 text-sm text-[var(--ink-100)]">{image.prompt}</p>
        </div>

        <div className="flex flex-col gap-2">
          <button
            type="button"
            className={primaryButton}
            disabled={image.status !== "valid" || saveState !== "idle"}
            onClick={() => void onSave()}
          >
            {saveState === "saved" ? "Saved to library" : saveState === "saving" ? "Saving..." : "Save to library"}
          </button>
          {objectUrl ? (
            <a
              href={objectUrl}
              download={`assetcraft-${(session.assetType ?? "asset").toLowerCase().replace(/\s+/g, "-")}`}
              className={`${secondaryButton} text-center`}
            >
              Download
            </a>
          ) : null}
          <button type="button" className={secondaryButton} onClick={generateAnother}>
            Generate another
          </button>
          <button type="button" className={secondaryButton} onClick={startOver}>
            Start over
          </button>
          {saveState === "saved" ? (
            <Link to="/library" className="text-center text-xs text-[var(--brand-sand)] underline">
              Open library
            </Link>
          ) : null}
          {saveError ? <p className="text-sm text-[var(--brand-coral)]">{saveError}</p> : null}
        </div>
      </aside>
    </div>
  );
};

const titles: Record<GenerationStep, string> = {
  assetTypeSelection: "What are you making?",
  assetSubtypeSelection: "Pick a style",
  colorInput: "Choose your colors",
  promptInput: "Describe it",
  generating: "Generating",
  preview: "Your asset"
};

const GeneratorWizard = ({ store, aiAvailable }: StoreProps & { aiAvailable: boolean }) => {
  const session = useStore(store, (state) => state.session);

  return (
    <section className="rounded-3xl border border-white/15 bg-black/20 p-6">
      <StepIndicator current={session.step} showColors={requiresColor(session)} />
      <h1 className="mt-5 font-display text-4xl text-[var(--ink-100)]">{titles[session.step]}</h1>
      {session.assetType ? (
        <p className="mt-2 text-sm text-[var(--ink-200)]">
          {session.assetType}
          {session.assetSubtype ? ` · ${session.assetSubtype}` : ""}
        </p>
      ) : null}

      <div className="mt-6">
        {session.step === "assetTypeSelection" ? <AssetTypeStep store={store} /> : null}
        {session.step === "assetSubtypeSelection" ? <SubtypeStep store={store} /> : null}
        {session.step === "colorInput" ? <ColorStep store={store} /> : null}
        {session.step === "promptInput" ? <PromptStep store={store} aiAvailable={aiAvailable} /> : null}
        {session.step === "generating" ? <GeneratingStep /> : null}
        {session.step === "preview" ? <PreviewStep store={store} /> : null}
      </div>
    </section>
  );
};

export const GeneratorPage = () => {
  const [store, setStore] = useState<GenerationStore | null>(null);
  const [aiAvailable, setAiAvailable] = useState(true);
  const aiAvailableRef = useRef(aiAvailable);
  const refreshBalance = useGemstoneStore((state) => state.refresh);

  useEffect(() => {
    aiAvailableRef.current = aiAvailable;
  }, [aiAvailable]);

  useEffect(() => {
    let active = true;
    generationApi
      .getStatus()
      .then((status) => {
        if (active) setAiAvailable(status.imageGeneration);
      })
      .catch((error: unknown) => {
        logger.warn("ai_status_unavailable", { error });
      });
    void refreshBalance();
    return () => {
      active = false;
    };
  }, [refreshBalance]);

  useEffect(() => {
    const next = createGenerationStore({
      ledger: gemstoneLedger,
      generateImage: async (request, signal) => {
        const response = await generationApi.generateImage(request, signal);
        return response ? { bytes: decodeBase64(response.image), mimeType: response.mimeType } : null;
      },
      isAiAvailable: () => aiAvailableRef.current,
      getBalance: () => useGemstoneStore.getState().balance,
      onBalanceChange: (balance, source) => useGemstoneStore.getState().setBalance(balance, source)
    });
    setStore(next);
    return () => {
      next.getState().dispose();
    };
  }, []);

  if (!store) return null;

  return <GeneratorWizard store={store} aiAvailable={aiAvailable} />;
};

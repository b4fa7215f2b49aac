// src/data/supplements.ts
// Educational supplement guide and the focus areas that point to each entry.

export const SUPPLEMENT_FOCUSES = [
  "skin_coat",
  "gut",
  "joint_mobility",
  "puppy_growth",
  "senior_vitality",
  "weight_management",
  "dental",
  "urinary",
] as const;
export type SupplementFocus = (typeof SUPPLEMENT_FOCUSES)[number];

export interface SupplementDefinition {
  id: string;
  name: string;
  why: string;
  bestFor: readonly string[];
  cautions: string;
  pairing: string;
  vetGuided: boolean;
}

export const SUPPLEMENTS: readonly SupplementDefinition[] = [
  {
    id: "omega-3",
    name: "Omega-3 (fish oil)",
    why: "Supports skin and coat, joint comfort and inflammatory balance.",
    bestFor: ["Dry or itchy skin", "Senior dogs", "Joint support plans"],
    cautions: "Dose carefully; may loosen stool. Ask a vet if the dog takes anything affecting clotting.",
    pairing: "Pairs well with lean proteins and antioxidant-rich vegetables.",
    vetGuided: false,
  },
  {
    id: "probiotics",
    name: "Probiotics",
    why: "May improve gut resilience and stool stability.",
    bestFor: ["Sensitive stomach", "Diet transitions", "Stress-related GI changes"],
    cautions: "Choose canine-specific or veterinary formulations.",
    pairing: "Works with pumpkin, oats and gentle proteins.",
    vetGuided: false,
  },
  {
    id: "prebiotic-fiber",
    name: "Prebiotic fiber (inulin, MOS)",
    why: "Feeds beneficial gut bacteria and may support stool quality.",
    bestFor: ["Soft stools", "Recovery after antibiotics, with a vet"],
    cautions: "Too much can cause gas.",
    pairing: "Combine with probiotics for a gentle synbiotic approach.",
    vetGuided: false,
  },
  {
    id: "calcium-support",
    name: "Calcium support for home-cooked diets",
    why: "Home-cooked meals usually need calcium balancing against meat phosphorus.",
    bestFor: ["Puppies", "Long-term cooked fresh routines"],
    cautions: "Both over- and under-supplementation are risky; confirm amounts with a vet nutritionist.",
    pairing: "Needed whenever meals are not built on a balanced commercial base.",
    vetGuided: true,
  },
  {
    id: "multivitamin",
    name: "Canine multivitamin",
    why: "Covers micronutrient gaps in simple home recipes.",
    bestFor: ["Limited ingredient variety", "Long-term home cooking"],
    cautions: "Avoid human multivitamins unless a vet approves.",
    pairing: "Best alongside rotation-based weekly menus.",
    vetGuided: false,
  },
  {
    id: "joint-support",
    name: "Joint support (glucosamine, chondroitin, UC-II)",
    why: "May support mobility and cartilage health.",
    bestFor: ["Large breeds", "Senior dogs", "Highly active dogs"],
    cautions: "Effects vary and usually take weeks to show.",
    pairing: "Pairs with omega-3 and weight control.",
    vetGuided: false,
  },
  {
    id: "vitamin-e",
    name: "Vitamin E",
    why: "Antioxidant support, usually alongside long-term omega-3.",
    bestFor: ["Dogs on omega-3 long-term"],
    cautions: "Avoid high doses without guidance.",
    pairing: "Consider when fish oil is used regularly.",
    vetGuided: true,
  },
  {
    id: "zinc",
    name: "Zinc support",
    why: "May support the skin barrier and coat quality.",
    bestFor: ["Specific deficiency concerns", "Some dermatology plans"],
    cautions: "Excess zinc is harmful; use only with professional guidance.",
    pairing: "Works alongside varied protein sources.",
    vetGuided: true,
  },
  {
    id: "dental-additive",
    name: "Dental additives (enzymatic or vet-approved)",
    why: "Helps reduce plaque in dogs that resist brushing.",
    bestFor: ["Small breeds prone to dental issues"],
    cautions: "Not a replacement for brushing.",
    pairing: "Pairs with safe crunchy vegetables where appropriate.",
    vetGuided: false,
  },
  {
    id: "l-carnitine",
    name: "L-carnitine",
    why: "May assist some weight management or cardiac support strategies.",
    bestFor: ["Vet-supervised weight plans"],
    cautions: "Use under professional advice.",
    pairing: "Best with lean proteins and a higher vegetable share.",
    vetGuided: true,
  },
  {
    id: "urinary-support",
    name: "Urinary support (condition-specific)",
    why: "Some dogs need tailored mineral and pH strategies.",
    bestFor: ["Vet-diagnosed urinary issues"],
    cautions: "Mineral balancing for urinary disease is medical; a vet is required.",
    pairing: "Consider hydration-rich meal design.",
    vetGuided: true,
  },
];

// in suggestion order
export const FOCUS_SUPPLEMENTS: Record<SupplementFocus, readonly string[]> = {
  skin_coat: ["omega-3", "vitamin-e", "zinc"],
  gut: ["probiotics", "prebiotic-fiber"],
  joint_mobility: ["joint-support", "omega-3"],
  puppy_growth: ["calcium-support", "multivitamin"],
  senior_vitality: ["omega-3", "joint-support", "probiotics"],
  weight_management: ["probiotics", "l-carnitine"],
  dental: ["dental-additive"],
  urinary: ["urinary-support"],
};
